/**
 * Raster <-> image file conversion through sharp
 */

import sharp from "sharp";
import { Raster } from "./raster.js";

export async function encodePng(raster: Raster): Promise<Buffer> {
    return sharp(Buffer.from(raster.data), {
        raw: { width: raster.width, height: raster.height, channels: 1 },
    })
        .png()
        .toBuffer();
}

export async function writePng(raster: Raster, path: string): Promise<void> {
    await sharp(Buffer.from(raster.data), {
        raw: { width: raster.width, height: raster.height, channels: 1 },
    })
        .png()
        .toFile(path);
}

/**
 * Decode any image sharp understands into a single-channel raster.
 * Transparency is flattened onto white so it reads as background.
 */
export async function readRaster(path: string): Promise<Raster> {
    const { data, info } = await sharp(path)
        .flatten({ background: "#ffffff" })
        .greyscale()
        .raw()
        .toBuffer({ resolveWithObject: true });

    const raster = new Raster(info.width, info.height);
    const channels = info.channels;
    for (let i = 0; i < raster.pixelCount; i++) {
        raster.data[i] = data[i * channels];
    }
    return raster;
}
