import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as bmp from 'bmp-js';
import sharp from 'sharp';
import { fail, ok, Result } from '../common/result';
import { AppConfig } from '../config/app.config';
import { ALLOWED_EXTENSIONS, IMAGE_SIZE, MAX_FILE_SIZE } from './classification.constants';
import {
  DecodeFailure,
  ImageTensor,
  PreprocessFailure,
  UploadedImage,
  ValidationFailure,
} from './classification.types';
import { normalizePixels } from './pixel-normalization';

export const NO_FILE_SELECTED: ValidationFailure = {
  kind: 'validation',
  message: 'No file was selected',
};

const UNREADABLE: DecodeFailure = {
  kind: 'decode',
  message: 'Failed to read the image. Please try a different image.',
};

/** Text after the last dot, lower-cased; empty when the name has no dot. */
export function fileExtension(filename: string): string {
  const dot = filename.lastIndexOf('.');
  return dot === -1 ? '' : filename.slice(dot + 1).toLowerCase();
}

function isBmp(buffer: Buffer): boolean {
  return buffer.length >= 2 && buffer[0] === 0x42 && buffer[1] === 0x4d;
}

@Injectable()
export class ImagePreprocessorService {
  private readonly logger = new Logger(ImagePreprocessorService.name);

  constructor(private readonly configService: ConfigService<AppConfig, true>) {}

  validate(file: UploadedImage | null | undefined): ValidationFailure | null {
    if (!file) {
      return NO_FILE_SELECTED;
    }

    const size = file.buffer.length;
    if (size === 0) {
      return { kind: 'validation', message: 'The selected file is empty' };
    }
    if (size > MAX_FILE_SIZE) {
      return {
        kind: 'validation',
        message: `File is too large (max ${MAX_FILE_SIZE / (1024 * 1024)}MB)`,
      };
    }

    if (!ALLOWED_EXTENSIONS.includes(fileExtension(file.filename))) {
      return {
        kind: 'validation',
        message: `Unsupported file type (allowed: ${ALLOWED_EXTENSIONS.join(', ')})`,
      };
    }

    return null;
  }

  /**
   * Validates the upload, decodes it to RGB, stretches it to the model's
   * square input and applies the configured channel normalization.
   */
  async prepare(
    file: UploadedImage | null | undefined,
  ): Promise<Result<ImageTensor, PreprocessFailure>> {
    if (!file) {
      return fail(NO_FILE_SELECTED);
    }
    const invalid = this.validate(file);
    if (invalid) {
      return fail(invalid);
    }

    let pixels: Buffer;
    try {
      pixels = await this.decode(file.buffer);
    } catch (error) {
      this.logger.warn(
        `Could not decode ${file.filename}: ${error instanceof Error ? error.message : String(error)}`,
      );
      return fail(UNREADABLE);
    }

    const mode = this.configService.get('model', { infer: true }).preprocessing;
    return ok({
      data: normalizePixels(pixels, mode),
      shape: [1, IMAGE_SIZE, IMAGE_SIZE, 3],
    });
  }

  private async decode(buffer: Buffer): Promise<Buffer> {
    const { data, info } = await this.open(buffer)
      .rotate()
      .removeAlpha()
      .toColourspace('srgb')
      .resize(IMAGE_SIZE, IMAGE_SIZE, { fit: 'fill' })
      .raw()
      .toBuffer({ resolveWithObject: true });

    if (info.channels !== 3 || info.width !== IMAGE_SIZE || info.height !== IMAGE_SIZE) {
      throw new Error(
        `Unexpected decoded layout ${info.width}x${info.height}x${info.channels}`,
      );
    }
    return data;
  }

  // libvips has no BMP loader, so bitmaps are unpacked to raw RGB first.
  private open(buffer: Buffer): sharp.Sharp {
    if (!isBmp(buffer)) {
      return sharp(buffer);
    }

    const image = bmp.decode(buffer);
    const rgb = Buffer.alloc(image.width * image.height * 3);
    for (let src = 0, dst = 0; dst < rgb.length; src += 4, dst += 3) {
      rgb[dst] = image.data[src + 3];
      rgb[dst + 1] = image.data[src + 2];
      rgb[dst + 2] = image.data[src + 1];
    }
    return sharp(rgb, { raw: { width: image.width, height: image.height, channels: 3 } });
  }
}
