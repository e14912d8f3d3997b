/**
 * @fileoverview FLAC PICTURE blocks
 *
 * Reads and rewrites the metadata block chain of a FLAC file. Only
 * PICTURE blocks (type 6) are touched; every other block and the audio
 * frames are copied byte for byte.
 *
 * Block layout: one header byte (bit 7 = last block, bits 0-6 = type),
 * a 24-bit big-endian length, then the body.
 *
 * @module domain/albumArt/flacPicture
 */

const kFLAC_MARKER = "fLaC";
const kBLOCK_HEADER_SIZE = 4;
const kLAST_BLOCK_FLAG = 0x80;
const kBLOCK_TYPE_MASK = 0x7f;
const kPICTURE_BLOCK = 6;
const kMAX_BLOCK_LENGTH = 0xffffff;

export interface FlacPicture {
    /** ID3v2 APIC picture type; 3 is the front cover */
    readonly type: number;
    readonly mime: string;
    readonly description: string;
    readonly width: number;
    readonly height: number;
    /** Bits per pixel, 0 when unknown */
    readonly depth: number;
    /** Palette size for indexed images, otherwise 0 */
    readonly colors: number;
    readonly data: Buffer;
}

interface MetadataBlock {
    readonly type: number;
    readonly body: Buffer;
}

/**
 * Split a FLAC file into its metadata blocks and the audio that follows.
 *
 * @throws Error when the marker is missing or a block runs past the end
 */
function splitFlac(file: Buffer): { blocks: MetadataBlock[]; audio: Buffer } {
    if (file.length < kFLAC_MARKER.length || file.toString("latin1", 0, kFLAC_MARKER.length) !== kFLAC_MARKER) {
        throw new Error("Not a FLAC file: missing fLaC marker");
    }

    const blocks: MetadataBlock[] = [];
    let offset = kFLAC_MARKER.length;
    let last = false;

    while (!last) {
        if (offset + kBLOCK_HEADER_SIZE > file.length) {
            throw new Error("Truncated FLAC metadata");
        }

        const header = file.readUInt8(offset);
        const length = file.readUIntBE(offset + 1, 3);
        const start = offset + kBLOCK_HEADER_SIZE;

        if (start + length > file.length) {
            throw new Error("Truncated FLAC metadata");
        }

        last = (header & kLAST_BLOCK_FLAG) !== 0;
        blocks.push({ type: header & kBLOCK_TYPE_MASK, body: file.subarray(start, start + length) });
        offset = start + length;
    }

    return { blocks, audio: file.subarray(offset) };
}

/**
 * Encode a PICTURE block body.
 */
export function encodePicture(picture: FlacPicture): Buffer {
    const mime = Buffer.from(picture.mime, "ascii");
    const description = Buffer.from(picture.description, "utf-8");

    const fields = Buffer.alloc(4 * 8 + mime.length + description.length);
    let offset = 0;

    const writeU32 = (value: number): void => {
        fields.writeUInt32BE(value, offset);
        offset += 4;
    };

    writeU32(picture.type);
    writeU32(mime.length);
    mime.copy(fields, offset);
    offset += mime.length;
    writeU32(description.length);
    description.copy(fields, offset);
    offset += description.length;
    writeU32(picture.width);
    writeU32(picture.height);
    writeU32(picture.depth);
    writeU32(picture.colors);
    writeU32(picture.data.length);

    return Buffer.concat([fields, picture.data]);
}

function decodePicture(body: Buffer): FlacPicture {
    let offset = 0;

    const readU32 = (): number => {
        const value = body.readUInt32BE(offset);
        offset += 4;
        return value;
    };
    const readBytes = (length: number): Buffer => {
        if (offset + length > body.length) {
            throw new Error("Truncated FLAC picture");
        }
        const bytes = body.subarray(offset, offset + length);
        offset += length;
        return bytes;
    };

    const type = readU32();
    const mime = readBytes(readU32()).toString("ascii");
    const description = readBytes(readU32()).toString("utf-8");
    const width = readU32();
    const height = readU32();
    const depth = readU32();
    const colors = readU32();
    const data = Buffer.from(readBytes(readU32()));

    return { type, mime, description, width, height, depth, colors, data };
}

function encodeBlock(block: MetadataBlock, last: boolean): Buffer {
    if (block.body.length > kMAX_BLOCK_LENGTH) {
        throw new Error(`FLAC metadata block too large: ${block.body.length} bytes`);
    }

    const header = Buffer.alloc(kBLOCK_HEADER_SIZE);
    header.writeUInt8((last ? kLAST_BLOCK_FLAG : 0) | block.type, 0);
    header.writeUIntBE(block.body.length, 1, 3);

    return Buffer.concat([header, block.body]);
}

/**
 * All PICTURE blocks of a FLAC file.
 */
export function readFlacPictures(file: Buffer): FlacPicture[] {
    return splitFlac(file).blocks
        .filter(block => block.type === kPICTURE_BLOCK)
        .map(block => decodePicture(block.body));
}

/**
 * Replace every PICTURE block with the given picture.
 *
 * @returns The new file contents
 */
export function embedFlacPicture(file: Buffer, picture: FlacPicture): Buffer {
    const { blocks, audio } = splitFlac(file);

    const kept = blocks.filter(block => block.type !== kPICTURE_BLOCK);
    kept.push({ type: kPICTURE_BLOCK, body: encodePicture(picture) });

    return Buffer.concat([
        Buffer.from(kFLAC_MARKER, "latin1"),
        ...kept.map((block, index) => encodeBlock(block, index === kept.length - 1)),
        audio,
    ]);
}
