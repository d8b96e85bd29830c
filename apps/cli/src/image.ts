/**
 * PNG files ⇄ pixel buffers, and labelled image directories ⇄ datasets.
 *
 * pngjs normalises every PNG colour type and bit depth to RGBA8.
 */
import { readFile, readdir, writeFile, mkdir } from "node:fs/promises";
import { dirname, join } from "node:path";
import { Effect } from "effect";
import pngjs from "pngjs";
import { ImageError } from "@verity/core";
import { Dataset, LABELS, datapointFromPixels, type Label, type PixelBuffer } from "@verity/data";

const { PNG } = pngjs;

export function decodePng(data: Buffer): PixelBuffer {
  const png = PNG.sync.read(data);
  return { width: png.width, height: png.height, data: new Uint8Array(png.data) };
}

export function encodePng(image: PixelBuffer): Buffer {
  const png = new PNG({ width: image.width, height: image.height });
  png.data = Buffer.from(image.data);
  return PNG.sync.write(png);
}

export function readImage(path: string): Effect.Effect<PixelBuffer, ImageError> {
  return Effect.tryPromise({
    try: async () => decodePng(await readFile(path)),
    catch: (cause) => new ImageError({ message: `Failed to read image "${path}"`, cause }),
  }).pipe(
    Effect.tap((image) => Effect.logDebug(`decoded ${path}: ${image.width}x${image.height}`)),
  );
}

export function writeImage(path: string, image: PixelBuffer): Effect.Effect<void, ImageError> {
  return Effect.tryPromise({
    try: async () => {
      await mkdir(dirname(path), { recursive: true });
      await writeFile(path, encodePng(image));
    },
    catch: (cause) => new ImageError({ message: `Failed to write image "${path}"`, cause }),
  });
}

function listPngs(dir: string): Effect.Effect<string[], ImageError> {
  return Effect.tryPromise({
    try: async () => {
      const entries = await readdir(dir, { withFileTypes: true });
      return entries
        .filter((e) => e.isFile() && e.name.toLowerCase().endsWith(".png"))
        .map((e) => join(dir, e.name))
        .sort();
    },
    catch: (cause) => new ImageError({ message: `Failed to list images in "${dir}"`, cause }),
  });
}

/**
 * Build a dataset from `<root>/real/*.png` and `<root>/fake/*.png`, each
 * directory in file-name order, real first.
 */
export function loadLabelledDataset(root: string): Effect.Effect<Dataset, ImageError> {
  const loadLabel = (label: Label) =>
    listPngs(join(root, label)).pipe(
      Effect.flatMap((paths) =>
        Effect.forEach(paths, (path) =>
          readImage(path).pipe(Effect.map((image) => datapointFromPixels(image, label))),
        ),
      ),
    );

  return Effect.forEach(LABELS, loadLabel).pipe(
    Effect.map((groups) => new Dataset(groups.flat())),
    Effect.tap((dataset) => Effect.logDebug(`loaded ${dataset.size()} images from ${root}`)),
  );
}
