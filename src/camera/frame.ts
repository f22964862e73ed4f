/**
 * Raster types shared by the camera, the recorder and the face encoder.
 *
 * Frames come off the camera as packed 8-bit BGR (the order ffmpeg's `bgr24`
 * pixel format produces); the face encoder and sharp both want RGB.
 */
import sharp from 'sharp';

interface Raster {
  readonly data: Buffer;
  readonly width: number;
  readonly height: number;
  readonly channels: 3;
}

export interface Frame extends Raster {
  readonly order: 'bgr';
}

export interface RgbImage extends Raster {
  readonly order: 'rgb';
}

export function expectedByteLength(width: number, height: number): number {
  return width * height * 3;
}

export function createFrame(data: Buffer, width: number, height: number): Frame {
  if (data.length !== expectedByteLength(width, height)) {
    throw new RangeError(
      `Frame of ${width}x${height} needs ${expectedByteLength(width, height)} bytes, got ${data.length}`,
    );
  }
  return { data, width, height, channels: 3, order: 'bgr' };
}

function swapRedBlue(src: Buffer): Buffer {
  const out = Buffer.allocUnsafe(src.length);
  for (let i = 0; i + 2 < src.length; i += 3) {
    out[i]     = src[i + 2] ?? 0;
    out[i + 1] = src[i + 1] ?? 0;
    out[i + 2] = src[i] ?? 0;
  }
  return out;
}

export function toRgb(frame: Frame): RgbImage {
  return { data: swapRedBlue(frame.data), width: frame.width, height: frame.height, channels: 3, order: 'rgb' };
}

export function toBgr(image: RgbImage): Frame {
  return { data: swapRedBlue(image.data), width: image.width, height: image.height, channels: 3, order: 'bgr' };
}

/** Decode any image sharp understands into packed RGB, dropping alpha. */
export async function decodeImageFile(filePath: string): Promise<RgbImage> {
  const { data, info } = await sharp(filePath)
    .removeAlpha()
    .toColourspace('srgb')
    .raw()
    .toBuffer({ resolveWithObject: true });

  if (info.channels !== 3) {
    throw new Error(`Unexpected channel count ${info.channels} in ${filePath}`);
  }
  return { data, width: info.width, height: info.height, channels: 3, order: 'rgb' };
}

/** Encode an RGB raster as PNG. */
export async function encodePng(image: RgbImage): Promise<Buffer> {
  return sharp(image.data, {
    raw: { width: image.width, height: image.height, channels: image.channels },
  })
    .png()
    .toBuffer();
}
