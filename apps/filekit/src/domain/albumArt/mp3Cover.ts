/**
 * @fileoverview MP3 cover art
 *
 * @module domain/albumArt/mp3Cover
 */

import NodeID3 from "node-id3";
import type { PreparedImage } from "./imageResize.js";

/**
 * ID3 picture type 3 is the front cover.
 */
const kFRONT_COVER = 3;

/**
 * Replace the APIC frame of an MP3 file with a front cover named "Cover".
 * A file without an ID3 tag gets one.
 *
 * @throws Error when the tag cannot be written
 */
export function writeMp3Cover(audioPath: string, image: PreparedImage): void {
    const result = NodeID3.update({
        image: {
            mime       : image.mime,
            type       : { id: kFRONT_COVER, name: "front cover" },
            description: "Cover",
            imageBuffer: image.data,
        },
    }, audioPath);

    if (result !== true) {
        throw result instanceof Error ? result : new Error(`Could not write ID3 tag to ${audioPath}`);
    }
}
