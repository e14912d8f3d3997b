/**
 * @fileoverview Skip Action Plugin
 *
 * Records a deliberate skip so that it shows up in the run summary
 * with its reason.
 *
 * @module domain/actions/SkipAction
 */

import type {
    ActionPlugin,
    ActionResult,
    ActionContext,
    ActionBindings,
} from "@filekit/engine";

export class SkipAction implements ActionPlugin {
    readonly id          = "skip";
    readonly name        = "Skip";
    readonly description = "Reports files a planner chose to leave alone";
    readonly bindings: ActionBindings = { skip: {} };

    async handle(context: ActionContext): Promise<ActionResult> {
        const reason = context.proposal.reason ?? "unspecified";

        context.logger.debug(`Skipped (${reason}): ${context.entity.content}`);

        return {
            actionId: this.id,
            success : true,
            status  : "skipped",
            data    : { reason },
        };
    }
}
