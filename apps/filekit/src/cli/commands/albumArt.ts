/**
 * @fileoverview Album art command
 *
 * @module cli/commands/albumArt
 */

import { existsSync } from "fs";
import { basename } from "path";
import { applyAlbumArt } from "../../domain/index.js";
import type { AlbumArtCommand } from "../args.js";
import type { CommandContext } from "../context.js";

export async function runAlbumArt(command: AlbumArtCommand, context: CommandContext): Promise<number> {
    for (const path of [command.audio, command.image]) {
        if (!existsSync(path)) {
            throw new Error(`File not found: ${path}`);
        }
    }

    const settings = context.config.albumArt;
    const image = await applyAlbumArt(command.audio, command.image, {
        maxDimension: command.maxDimension ?? settings.maxDimension,
        jpegQuality : settings.jpegQuality,
    });

    context.print(`Embedded ${image.width}x${image.height} ${image.mime} cover into ${basename(command.audio)}`);

    return 0;
}
