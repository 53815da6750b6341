import { describe, it, expect } from 'vitest';
import { createPPM } from '../../test/utils';
import { DecoderError } from '../core/errors';
import { ImageDecoderRegistry } from './ImageDecoderRegistry';
import type { ImageDecoder } from './shared';

function fakeDecoder(formatName: string, magic: number, width: number): ImageDecoder {
  return {
    formatName,
    canDecode: (bytes) => bytes[0] === magic,
    decode: async () => ({ width, height: 1, data: new Float32Array(width * 4) }),
  };
}

describe('ImageDecoderRegistry', () => {
  it('IDR-001: ships with the netpbm decoder', async () => {
    const registry = new ImageDecoderRegistry();
    expect(registry.formats).toEqual(['netpbm']);

    const image = await registry.decode(createPPM(3, 1, () => [0, 0, 0]), 'plate.ppm');
    expect(image.formatName).toBe('netpbm');
    expect(image.width).toBe(3);
  });

  it('IDR-002: rejects data no decoder accepts', async () => {
    const registry = new ImageDecoderRegistry();
    expect(registry.getDecoder(new Uint8Array([1, 2, 3]))).toBeNull();

    const result = registry.decode(new Uint8Array([1, 2, 3]), 'plate.bin');
    await expect(result).rejects.toThrow(DecoderError);
    await expect(result).rejects.toThrow('[unknown] No decoder for plate.bin');
  });

  it('IDR-003: registered decoders are tried after the built-in one', async () => {
    const registry = new ImageDecoderRegistry();
    registry.register(fakeDecoder('fake', 0xff, 5));
    expect(registry.formats).toEqual(['netpbm', 'fake']);

    const image = await registry.decode(new Uint8Array([0xff]));
    expect(image.formatName).toBe('fake');
    expect(image.width).toBe(5);
  });

  it('IDR-004: registering the same format name replaces the decoder', async () => {
    const registry = new ImageDecoderRegistry();
    registry.register(fakeDecoder('fake', 0xff, 5));
    registry.register(fakeDecoder('fake', 0xfe, 7));

    expect(registry.formats).toEqual(['netpbm', 'fake']);
    expect(registry.getDecoder(new Uint8Array([0xff]))).toBeNull();
    expect((await registry.decode(new Uint8Array([0xfe]))).width).toBe(7);
  });
});
