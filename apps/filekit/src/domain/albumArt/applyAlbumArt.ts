/**
 * @fileoverview Album art applier
 *
 * Resizes an image and embeds it as the front cover of an MP3 or FLAC file.
 *
 * @module domain/albumArt/applyAlbumArt
 */

import { readFileSync, writeFileSync } from "fs";
import { basename } from "path";
import { splitExt } from "../utils/filename.js";
import { embedFlacPicture } from "./flacPicture.js";
import { resizeImage, type PreparedImage, type ResizeOptions } from "./imageResize.js";
import { writeMp3Cover } from "./mp3Cover.js";

/**
 * Picture type for the front cover, shared by ID3 and FLAC.
 */
const kFRONT_COVER = 3;

export type CoverTarget = "mp3" | "flac";

/**
 * Which writer handles the audio file.
 *
 * @throws Error for anything but .mp3 and .flac
 */
export function coverTargetOf(audioPath: string): CoverTarget {
    const extension = splitExt(basename(audioPath))[1].toLowerCase();

    switch (extension) {
        case ".mp3":
            return "mp3";
        case ".flac":
            return "flac";
        default:
            throw new Error(`Unsupported audio file type: ${extension || "(none)"}`);
    }
}

/**
 * Embed `image` as the front cover of `audioPath`.
 *
 * The audio type is checked before the image is touched.
 *
 * @returns The image as it was embedded
 */
export async function applyAlbumArt(audioPath: string, imagePath: string, options: ResizeOptions = {}): Promise<PreparedImage> {
    const target = coverTargetOf(audioPath);
    const image = await resizeImage(imagePath, options);

    if (target === "mp3") {
        writeMp3Cover(audioPath, image);
    }
    else {
        const updated = embedFlacPicture(readFileSync(audioPath), {
            type       : kFRONT_COVER,
            mime       : image.mime,
            description: "Cover",
            width      : image.width,
            height     : image.height,
            depth      : 0,
            colors     : 0,
            data       : image.data,
        });
        writeFileSync(audioPath, updated);
    }

    return image;
}
