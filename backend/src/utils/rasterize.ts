import sharp from 'sharp';

export type RasterizeSvg = (svg: string) => Promise<Buffer>;

export const rasterizeSvgToPng: RasterizeSvg = (svg) => sharp(Buffer.from(svg, 'utf8')).png().toBuffer();
