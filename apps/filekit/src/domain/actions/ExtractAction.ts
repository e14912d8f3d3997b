/**
 * @fileoverview Extract Action Plugin
 *
 * Implements the ActionPlugin contract on top of the ArchiveExtractor.
 *
 * @module domain/actions/ExtractAction
 */

import type {
    ActionPlugin,
    ActionResult,
    ActionContext,
    ActionBindings,
} from "@filekit/engine";
import type { ArchiveExtractor } from "../../adapters/archive/index.js";
import { isFileEntry } from "../entities/FileEntry.js";

export interface ExtractActionConfig {
    readonly extractor: ArchiveExtractor;
    readonly bindings?: ActionBindings;
}

export class ExtractAction implements ActionPlugin {
    readonly id          = "extract-archive";
    readonly name        = "Extract Archive";
    readonly description = "Extracts an archive into a folder named after it";
    readonly bindings: ActionBindings;

    private readonly extractor: ArchiveExtractor;

    constructor(config: ExtractActionConfig) {
        this.extractor = config.extractor;
        this.bindings  = config.bindings ?? { extract: {} };
    }

    async handle(context: ActionContext): Promise<ActionResult> {
        const { entity, proposal } = context;

        if (!isFileEntry(entity)) {
            return {
                actionId: this.id,
                success : false,
                status  : "error",
                error   : "Entity is not a file entry",
            };
        }

        const result = await this.extractor.processArchive(proposal.target ?? entity.metadata.path);

        return {
            actionId: this.id,
            success : result.success,
            status  : result.success ? "extracted" : "failed",
            error   : result.error,
            data    : {
                archive        : result.archive,
                destination    : result.destination,
                attempts       : result.attempts,
                placed         : result.placed,
                skipped        : result.skipped,
                deletedOriginal: result.deletedOriginal,
            },
        };
    }
}
