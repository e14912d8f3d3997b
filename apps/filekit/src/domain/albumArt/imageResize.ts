/**
 * @fileoverview Cover image preparation
 *
 * @module domain/albumArt/imageResize
 */

import sharp from "sharp";

export interface ResizeOptions {
    /** Longest side allowed (default: 2500) */
    maxDimension?: number;

    /** JPEG quality for non-PNG output (default: 95) */
    jpegQuality?: number;
}

export interface PreparedImage {
    readonly data: Buffer;
    readonly mime: "image/png" | "image/jpeg";
    readonly width: number;
    readonly height: number;
}

/**
 * New size for an image whose longest side must not exceed `max`.
 * The short side is floored.
 */
export function fitWithin(width: number, height: number, max: number): { width: number; height: number } {
    if (width <= max && height <= max) {
        return { width, height };
    }

    return width > height
        ? { width: max, height: Math.floor(height * (max / width)) }
        : { width: Math.floor(width * (max / height)), height: max };
}

/**
 * Load an image, downscale it if needed, and encode it for embedding.
 * PNG stays PNG; every other format becomes JPEG.
 *
 * @throws Error when the file is not an image sharp can read
 */
export async function resizeImage(imagePath: string, options: ResizeOptions = {}): Promise<PreparedImage> {
    const maxDimension = options.maxDimension ?? 2500;
    const jpegQuality = options.jpegQuality ?? 95;

    const metadata = await sharp(imagePath).metadata();
    if (!metadata.width || !metadata.height) {
        throw new Error(`Could not read image size: ${imagePath}`);
    }

    const size = fitWithin(metadata.width, metadata.height, maxDimension);
    let pipeline = sharp(imagePath);

    if (size.width !== metadata.width || size.height !== metadata.height) {
        pipeline = pipeline.resize(size.width, size.height, { kernel: sharp.kernel.lanczos3, fit: "fill" });
    }

    const isPng = metadata.format === "png";
    const { data, info } = await (isPng ? pipeline.png() : pipeline.jpeg({ quality: jpegQuality }))
        .toBuffer({ resolveWithObject: true });

    return {
        data,
        mime  : isPng ? "image/png" : "image/jpeg",
        width : info.width,
        height: info.height,
    };
}
