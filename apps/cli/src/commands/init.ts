/**
 * Command: verity init
 *
 * Usage:
 *   verity init --out=networks/classifier.json
 *   verity init --out=networks/small.bin --size=8 --hidden=16,16 --activation=relu --cost=cce --format=binary --seed=7
 *
 * Builds a randomly initialised classifier for `size`×`size` RGBA images:
 * input → hidden layers → 2 outputs, every layer using `activation`.
 */
import { Effect } from "effect";
import {
  ACTIVATION_KINDS, COST_KINDS, RngService, isActivationKind, isCostKind,
} from "@verity/core";
import { CHANNEL_COUNT, LABEL_COUNT } from "@verity/data";
import { Network, saveNetwork, type NetworkFormat } from "@verity/model";
import { choiceArg, intListArg, positiveIntArg, parseKV, requireArg } from "../parse.js";
import { runCommand } from "../runtime.js";

const FORMATS: readonly NetworkFormat[] = ["json", "binary"];

function isFormat(value: unknown): value is NetworkFormat {
  return value === "json" || value === "binary";
}

export async function initCmd(args: string[]): Promise<void> {
  const kv = parseKV(args);

  const program = Effect.suspend(() => {
    const outPath = requireArg(kv, "out", "where to write the network");
    const size = positiveIntArg(kv, "size", 64);
    const hidden = intListArg(kv, "hidden", [64, 64, 64]);
    const activation = choiceArg(kv, "activation", ACTIVATION_KINDS, isActivationKind, "sigmoid");
    const cost = choiceArg(kv, "cost", COST_KINDS, isCostKind, "mse");
    const format = choiceArg(kv, "format", FORMATS, isFormat, "json");

    return RngService.pipe(
      Effect.map((rng) => {
        const builder = Network.create(size * size * CHANNEL_COUNT, rng);
        for (const width of hidden) builder.addLayer(width, activation);
        return builder.addLayer(LABEL_COUNT, activation).build(cost);
      }),
      Effect.tap((network) =>
        Effect.log(
          `built ${[network.inputSize, ...network.layers.map((l) => l.getSize())].join(" → ")} (${activation}, ${cost})`,
        ),
      ),
      Effect.flatMap((network) => saveNetwork(outPath, network, format)),
      Effect.tap(() => Effect.log(`wrote ${outPath}`)),
    );
  });

  await runCommand(kv, program);
}
