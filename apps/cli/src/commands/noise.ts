/**
 * Command: verity noise
 *
 * Usage:
 *   verity noise --image=images/test.png --alpha=0.3 --out=images/test-noisy.png [--seed=1]
 *
 * Round-trips the image through the input vector codec with noise added. The
 * output takes the closest-to-square shape for the pixel count, which may
 * differ from the input's.
 */
import { Effect } from "effect";
import { RngService } from "@verity/core";
import { datapointFromPixels, pixelsFromDatapoint } from "@verity/data";
import { readImage, writeImage } from "../image.js";
import { floatArg, parseKV, requireArg } from "../parse.js";
import { runCommand } from "../runtime.js";

export async function noiseCmd(args: string[]): Promise<void> {
  const kv = parseKV(args);

  const program = Effect.suspend(() => {
    const imagePath = requireArg(kv, "image", "PNG to perturb");
    const outPath = requireArg(kv, "out", "where to write the PNG");
    const alpha = floatArg(kv, "alpha", 0.5);

    return Effect.all([readImage(imagePath), RngService]).pipe(
      Effect.map(([image, rng]) => {
        const { datapoint } = datapointFromPixels(image).addNoise(alpha, rng);
        return { before: image, after: pixelsFromDatapoint(datapoint) };
      }),
      Effect.tap(({ before, after }) =>
        before.width === after.width && before.height === after.height
          ? Effect.void
          : Effect.logWarning(`reshaped ${before.width}x${before.height} → ${after.width}x${after.height}`),
      ),
      Effect.flatMap(({ after }) => writeImage(outPath, after)),
      Effect.tap(() => Effect.log(`wrote ${outPath}`)),
    );
  });

  await runCommand(kv, program);
}
