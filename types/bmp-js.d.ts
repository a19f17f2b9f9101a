declare module "bmp-js" {
  export interface BmpImage {
    width: number;
    height: number;
    /** Four bytes per pixel in A, B, G, R order. */
    data: Buffer;
  }

  const bmp: {
    decode(buffer: Buffer): BmpImage;
  };

  export default bmp;
}
