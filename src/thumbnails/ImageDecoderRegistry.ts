/**
 * Image decoder registry
 *
 * Detects the format of a file by its leading bytes and dispatches to the
 * first decoder that accepts it. The binary netpbm decoder is built in;
 * hosts register decoders for production formats (EXR, DPX, ...).
 */

import { DecoderError } from '../core/errors';
import { netpbmDecoder } from './NetpbmDecoder';
import type { DecodedImage, ImageDecoder } from './shared';

export class ImageDecoderRegistry {
  private decoders: ImageDecoder[] = [netpbmDecoder];

  /** Register a decoder, replacing any with the same format name. */
  register(decoder: ImageDecoder): void {
    const existing = this.decoders.findIndex((d) => d.formatName === decoder.formatName);
    if (existing >= 0) {
      this.decoders[existing] = decoder;
    } else {
      this.decoders.push(decoder);
    }
  }

  getDecoder(bytes: Uint8Array): ImageDecoder | null {
    return this.decoders.find((d) => d.canDecode(bytes)) ?? null;
  }

  get formats(): string[] {
    return this.decoders.map((d) => d.formatName);
  }

  /**
   * Decode with the first matching decoder.
   * @throws DecoderError when no decoder accepts the data
   */
  async decode(bytes: Uint8Array, label: string = 'image'): Promise<DecodedImage & { formatName: string }> {
    const decoder = this.getDecoder(bytes);
    if (!decoder) {
      throw new DecoderError('unknown', `No decoder for ${label}`);
    }
    const image = await decoder.decode(bytes);
    return { ...image, formatName: decoder.formatName };
  }
}
