declare module 'bmp-js' {
  /** Pixel data is four bytes per pixel in A, B, G, R order. */
  export interface BmpImage {
    data: Buffer;
    width: number;
    height: number;
  }

  export function decode(buffer: Buffer): BmpImage;
}
