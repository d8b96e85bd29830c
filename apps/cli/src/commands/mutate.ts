/**
 * Command: verity mutate
 *
 * Usage:
 *   verity mutate --network=networks/classifier.json --alpha=0.05 --out=networks/child.json [--seed=1]
 *
 * Writes a copy of the network with every weight and bias perturbed by a
 * uniform draw in [-alpha, alpha). The output is binary when `--out` ends in
 * `.bin`, JSON otherwise.
 */
import { Effect } from "effect";
import { RngService } from "@verity/core";
import { loadNetwork, saveNetwork } from "@verity/model";
import { floatArg, parseKV, requireArg } from "../parse.js";
import { runCommand } from "../runtime.js";

export async function mutateCmd(args: string[]): Promise<void> {
  const kv = parseKV(args);

  const program = Effect.suspend(() => {
    const networkPath = requireArg(kv, "network", "path to network");
    const outPath = requireArg(kv, "out", "where to write the mutated network");
    const alpha = floatArg(kv, "alpha", 0.1);
    const format = /\.bin$/i.test(outPath) ? "binary" : "json";

    return Effect.all([loadNetwork(networkPath), RngService]).pipe(
      Effect.map(([network, rng]) => {
        network.mutate(alpha, rng);
        return network;
      }),
      Effect.flatMap((network) => saveNetwork(outPath, network, format)),
      Effect.tap(() => Effect.log(`mutated ${networkPath} with alpha=${alpha} → ${outPath}`)),
    );
  });

  await runCommand(kv, program);
}
