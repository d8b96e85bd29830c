/**
 * Command: verity classify
 *
 * Usage:
 *   verity classify [--config=config/config.json] [--settingsPath=...] [--testPath=...]
 *
 * Loads the network named by `settingsPath`, decodes the PNG at `testPath`
 * and prints the predicted label with the raw outputs.
 */
import { Effect } from "effect";
import { datapointFromPixels, labelName } from "@verity/data";
import { loadNetwork } from "@verity/model";
import { loadConfig } from "../config.js";
import { readImage } from "../image.js";
import { parseKV } from "../parse.js";
import { runCommand } from "../runtime.js";

export async function classifyCmd(args: string[]): Promise<void> {
  const kv = parseKV(args);

  const program = loadConfig(kv).pipe(
    Effect.flatMap((config) => Effect.all([loadNetwork(config.settingsPath), readImage(config.testPath)])),
    Effect.map(([network, image]) => network.run(datapointFromPixels(image))),
    Effect.flatMap(({ label, outputs }) =>
      Effect.sync(() => console.log(`Label: ${labelName(label)}, Outputs: [${outputs.join(", ")}]`)),
    ),
  );

  await runCommand(kv, program);
}
