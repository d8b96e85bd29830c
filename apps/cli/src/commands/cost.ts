/**
 * Command: verity cost
 *
 * Usage:
 *   verity cost --network=networks/classifier.json --data=data/labelled
 *
 * `data` holds `real/` and `fake/` directories of PNG images.
 */
import { Effect } from "effect";
import { loadNetwork } from "@verity/model";
import { loadLabelledDataset } from "../image.js";
import { parseKV, requireArg } from "../parse.js";
import { runCommand } from "../runtime.js";

export async function costCmd(args: string[]): Promise<void> {
  const kv = parseKV(args);

  const program = Effect.suspend(() => {
    const networkPath = requireArg(kv, "network", "path to network");
    const dataPath = requireArg(kv, "data", "directory with real/ and fake/ images");

    return Effect.all([loadNetwork(networkPath), loadLabelledDataset(dataPath)]).pipe(
      Effect.tap(([, dataset]) => {
        const { real, fake } = dataset.counts();
        return Effect.log(`dataset: ${real} real, ${fake} fake`);
      }),
      Effect.flatMap(([network, dataset]) =>
        Effect.sync(() => console.log(`Cost (${network.costKind}): ${network.cost(dataset)}`)),
      ),
    );
  });

  await runCommand(kv, program);
}
