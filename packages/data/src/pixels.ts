/**
 * Pixel buffer ⇄ input vector codec.
 *
 * Vectors are row-major, channel-interleaved RGBA. Encoding divides each byte
 * by 256 so values land in [0, 1); decoding multiplies by 255 and truncates.
 */
import { CodecError } from "@verity/core";
import { Datapoint } from "./datapoint.js";
import type { Label } from "./label.js";

export const CHANNEL_COUNT = 4;

/** RGBA8 image, `data.length === width * height * 4`. */
export interface PixelBuffer {
  readonly width: number;
  readonly height: number;
  readonly data: Uint8Array;
}

export function datapointFromPixels(image: PixelBuffer, label: Label = "real"): Datapoint {
  const { width, height, data } = image;
  const expected = width * height * CHANNEL_COUNT;
  if (data.length !== expected) {
    throw new CodecError({
      message: `Pixel buffer holds ${data.length} bytes, ${width}x${height} RGBA needs ${expected}`,
    });
  }

  const inputs = new Array<number>(expected);
  for (let i = 0; i < expected; i++) inputs[i] = data[i] / 256;
  return new Datapoint(inputs, label);
}

/**
 * Closest-to-square factorisation of a pixel count. Starts from floor/ceil of
 * the square root and shrinks height or grows width until the product matches.
 */
export function imageDimensions(pixelCount: number): { width: number; height: number } {
  if (!Number.isInteger(pixelCount) || pixelCount <= 0) {
    throw new CodecError({ message: `Cannot lay out ${pixelCount} pixels` });
  }

  const root = Math.sqrt(pixelCount);
  let width = Math.floor(root);
  let height = Math.ceil(root);

  while (width * height !== pixelCount) {
    if (width * height > pixelCount) height--;
    else width++;
  }

  return { width, height };
}

function toByte(value: number): number {
  const scaled = Math.trunc(value * 255);
  if (Number.isNaN(scaled) || scaled < 0) return 0;
  return scaled > 255 ? 255 : scaled;
}

export function pixelsFromDatapoint(datapoint: Datapoint): PixelBuffer {
  const inputs = datapoint.inputs;
  if (inputs.length === 0 || inputs.length % CHANNEL_COUNT !== 0) {
    throw new CodecError({
      message: `Input length ${inputs.length} is not a positive multiple of ${CHANNEL_COUNT}`,
    });
  }

  const { width, height } = imageDimensions(inputs.length / CHANNEL_COUNT);
  const data = new Uint8Array(inputs.length);

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const index = (x + y * width) * CHANNEL_COUNT;
      for (let c = 0; c < CHANNEL_COUNT; c++) {
        data[index + c] = toByte(inputs[index + c]);
      }
    }
  }

  return { width, height, data };
}
