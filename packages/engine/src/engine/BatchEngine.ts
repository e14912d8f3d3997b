/**
 * @fileoverview BatchEngine
 *
 * Runs a registered domain once. The provider is drained page by page;
 * for every entity all planners are consulted, the most confident
 * proposal wins (earlier planner on a tie), and every action bound to
 * the winning operation runs in registration order. A failing planner
 * or action is logged and recorded; only a failing provider aborts the
 * run.
 *
 * The engine knows nothing about files. Domains bring the provider,
 * planners and actions.
 *
 * @module @filekit/engine/engine/BatchEngine
 */

import type { Entity } from "../contracts/Entity.js";
import type { Proposal } from "../contracts/Proposal.js";
import { getEffectiveConfidence } from "../contracts/Proposal.js";
import type { PlannerPlugin, PluginLogger } from "../contracts/PlannerPlugin.js";
import type { ActionPlugin, ActionResult } from "../contracts/ActionPlugin.js";
import { shouldActionExecute } from "../contracts/ActionPlugin.js";
import type { EntityProvider } from "../contracts/EntityProvider.js";
import type { EngineEventMap, EventBus, ProcessingEventType } from "../contracts/EventBus.js";
import { createEvent } from "../contracts/EventBus.js";
import { InMemoryEventBus } from "../impl/InMemoryEventBus.js";

export interface DomainRegistration {
    readonly id: string;
    readonly name: string;
    readonly provider: EntityProvider<Entity<object>>;

    /** Consulted in order; order breaks confidence ties */
    readonly planners: readonly PlannerPlugin[];

    readonly actions: readonly ActionPlugin[];

    /** Handed to every planner and action as `context.config` */
    readonly config?: Record<string, unknown>;
}

export interface EngineConfig {
    /** Page size asked of the provider. Default 50 */
    readonly batchSize?: number;
    readonly eventBus?: EventBus;
    readonly logger?: EngineLogger;
}

export type EngineLogger = PluginLogger;

export interface EntityOutcome {
    readonly entityId: string;
    readonly traceId: string;

    /** Winning proposal, null when no planner had one */
    readonly proposal: Proposal | null;
    readonly plannerId: string | null;

    /** One per action that ran */
    readonly results: readonly ActionResult[];

    /** Set when the entity failed outside any plugin */
    readonly error?: string;
}

export interface RunSummary {
    readonly domainId: string;
    readonly scanned: number;
    readonly planned: number;
    readonly unplanned: number;

    /** Entities with an errored outcome or an unsuccessful action */
    readonly failed: number;

    readonly outcomes: readonly EntityOutcome[];
    readonly durationMs: number;
}

interface Candidate {
    readonly proposal: Proposal;
    readonly plannerId: string;
}

const kDEFAULT_BATCH_SIZE = 50;

const consoleLogger: EngineLogger = {
    debug: (msg, data) => console.debug(`[DEBUG] ${msg}`, data ?? ""),
    info : (msg, data) => console.info(`[INFO] ${msg}`, data ?? ""),
    warn : (msg, data) => console.warn(`[WARN] ${msg}`, data ?? ""),
    error: (msg, data) => console.error(`[ERROR] ${msg}`, data ?? ""),
};

function newTraceId(): string {
    return `tr_${Date.now().toString(36)}_${Math.random().toString(36).slice(2, 8)}`;
}

function messageOf(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Highest effective confidence wins; the first candidate keeps a tie.
 */
function pickWinner(candidates: ReadonlyArray<Candidate | null>): Candidate | null {
    let winner: Candidate | null = null;
    for (const candidate of candidates) {
        if (candidate !== null
            && (winner === null || getEffectiveConfidence(candidate.proposal) > getEffectiveConfidence(winner.proposal))) {
            winner = candidate;
        }
    }
    return winner;
}

function summarize(domainId: string, outcomes: EntityOutcome[], startedAt: number): RunSummary {
    let planned = 0;
    let unplanned = 0;
    let failed = 0;

    for (const outcome of outcomes) {
        if (outcome.proposal !== null) {
            planned++;
        }
        else if (outcome.error === undefined) {
            unplanned++;
        }
        if (outcome.error !== undefined || outcome.results.some(result => !result.success)) {
            failed++;
        }
    }

    return {
        domainId,
        scanned   : outcomes.length,
        planned,
        unplanned,
        failed,
        outcomes,
        durationMs: Date.now() - startedAt,
    };
}

/**
 * @example
 * ```typescript
 * const engine = new BatchEngine({ logger });
 *
 * engine.registerDomain({
 *     id      : "fix-spaces",
 *     name    : "Fix misplaced spaces",
 *     provider: new DirectoryEntryProvider({ directory: "." }),
 *     planners: [new SpacingPlanner()],
 *     actions : [new RenameAction({ dryRun: true })],
 * });
 *
 * engine.eventBus.subscribe("entity:actionExecuted", ({ data }) => {
 *     console.log(data.entityId, data.status);
 * });
 *
 * const summary = await engine.run("fix-spaces");
 * ```
 */
export class BatchEngine {
    readonly eventBus: EventBus;

    private readonly batchSize: number;
    private readonly logger: EngineLogger;
    private readonly domains = new Map<string, DomainRegistration>();

    constructor(config: EngineConfig = {}) {
        this.eventBus  = config.eventBus ?? new InMemoryEventBus();
        this.batchSize = config.batchSize ?? kDEFAULT_BATCH_SIZE;
        this.logger    = config.logger ?? consoleLogger;
    }

    /**
     * @throws Error when the id is already taken
     */
    registerDomain(domain: DomainRegistration): void {
        if (this.domains.has(domain.id)) {
            throw new Error(`Domain already registered: ${domain.id}`);
        }

        this.domains.set(domain.id, domain);
        this.logger.debug("Domain registered", {
            domainId: domain.id,
            name    : domain.name,
            planners: domain.planners.length,
            actions : domain.actions.length,
        });
    }

    unregisterDomain(domainId: string): void {
        if (this.domains.delete(domainId)) {
            this.logger.debug("Domain unregistered", { domainId });
        }
    }

    /**
     * Drain the domain's provider once. The provider is shut down whether
     * or not the run succeeds.
     *
     * @throws Error for an unknown domain, or whatever the provider throws
     */
    async run(domainId: string): Promise<RunSummary> {
        const domain = this.domains.get(domainId);
        if (domain === undefined) {
            throw new Error(`Unknown domain: ${domainId}`);
        }

        const startedAt = Date.now();
        const outcomes: EntityOutcome[] = [];
        const { provider } = domain;

        this.eventBus.emit(createEvent("run:started", { domainId, providerId: provider.id }));

        try {
            await provider.initialize?.();

            let cursor: string | undefined;
            let hasMore = true;
            while (hasMore) {
                const page = await provider.getEntities(
                    cursor === undefined ? { limit: this.batchSize } : { limit: this.batchSize, cursor }
                );
                for (const entity of page.entities) {
                    outcomes.push(await this.processEntity(domain, entity));
                }
                ({ cursor, hasMore } = page);
            }
        }
        catch (error) {
            this.logger.error("Run failed", { domainId, error: messageOf(error) });
            this.eventBus.emit(createEvent("run:error", { domainId, error: messageOf(error) }));
            throw error;
        }
        finally {
            try {
                await provider.shutdown?.();
            }
            catch (error) {
                this.logger.error("Provider shutdown error", { domainId, error: messageOf(error) });
            }
        }

        const summary = summarize(domainId, outcomes, startedAt);
        this.eventBus.emit(createEvent("run:completed", {
            domainId,
            scanned   : summary.scanned,
            planned   : summary.planned,
            unplanned : summary.unplanned,
            failed    : summary.failed,
            durationMs: summary.durationMs,
        }));

        return summary;
    }

    /**
     * Plan and act on one entity. Never throws; an unexpected failure
     * becomes an outcome with `error` set.
     */
    async processEntity(domain: DomainRegistration, entity: Entity<object>): Promise<EntityOutcome> {
        const traceId = newTraceId();
        const startedAt = Date.now();
        const ref = { domainId: domain.id, entityId: entity.id };
        const emit = <K extends ProcessingEventType>(type: K, data: EngineEventMap[K]): void => {
            this.eventBus.emit(createEvent(type, data, traceId));
        };
        const outcome = (fields: Omit<EntityOutcome, "entityId" | "traceId">): EntityOutcome =>
            ({ entityId: entity.id, traceId, ...fields });

        emit("entity:received", ref);

        try {
            const winner = await this.plan(domain, entity, traceId);

            if (winner === null) {
                emit("entity:unplanned", ref);
                this.logger.debug("Entity unplanned (no proposal)", { ...ref, traceId });
                return outcome({ proposal: null, plannerId: null, results: [] });
            }

            const { proposal, plannerId } = winner;
            emit("entity:planned", {
                ...ref,
                operation : proposal.operation,
                target    : proposal.target,
                reason    : proposal.reason,
                confidence: getEffectiveConfidence(proposal),
                plannerId,
            });

            const results: ActionResult[] = [];
            for (const action of domain.actions.filter(candidate => shouldActionExecute(candidate, proposal))) {
                emit("entity:actionExecuting", { ...ref, actionId: action.id, operation: proposal.operation });

                const { result, thrown } = await this.act(domain, action, entity, proposal, traceId);
                results.push(result);

                if (thrown !== undefined) {
                    emit("entity:actionError", { ...ref, actionId: action.id, error: thrown });
                }
                else {
                    emit("entity:actionExecuted", {
                        ...ref,
                        actionId: action.id,
                        success : result.success,
                        status  : result.status,
                        target  : proposal.target,
                        error   : result.error,
                    });
                }
            }

            emit("entity:processed", { ...ref, operation: proposal.operation, duration: Date.now() - startedAt });

            return outcome({ proposal, plannerId, results });
        }
        catch (error) {
            emit("entity:error", { ...ref, error: messageOf(error) });
            this.logger.error("Entity processing error", { ...ref, traceId, error: messageOf(error) });
            return outcome({ proposal: null, plannerId: null, results: [], error: messageOf(error) });
        }
    }

    private async plan(domain: DomainRegistration, entity: Entity<object>, traceId: string): Promise<Candidate | null> {
        const candidates = await Promise.all(domain.planners.map(async (planner): Promise<Candidate | null> => {
            try {
                const proposal = await planner.plan(entity, {
                    config: domain.config ?? {},
                    logger: this.pluginLogger(domain.id, planner.id, traceId),
                    traceId,
                });
                return proposal ? { proposal, plannerId: planner.id } : null;
            }
            catch (error) {
                this.logger.error("Planner error", {
                    domainId : domain.id,
                    plannerId: planner.id,
                    entityId : entity.id,
                    error    : messageOf(error),
                });
                return null;
            }
        }));

        return pickWinner(candidates);
    }

    /**
     * A thrown error becomes a result with status "error"; `thrown`
     * carries its message.
     */
    private async act(
        domain: DomainRegistration,
        action: ActionPlugin,
        entity: Entity<object>,
        proposal: Proposal,
        traceId: string
    ): Promise<{ result: ActionResult; thrown?: string }> {
        const where = { domainId: domain.id, actionId: action.id, entityId: entity.id };

        try {
            const result = await action.handle({
                entity,
                proposal,
                config: domain.config ?? {},
                logger: this.pluginLogger(domain.id, action.id, traceId),
                traceId,
            });
            if (!result.success) {
                this.logger.warn("Action failed", { ...where, error: result.error });
            }
            return { result };
        }
        catch (error) {
            const thrown = messageOf(error);
            this.logger.error("Action execution error", { ...where, error: thrown });
            return { result: { actionId: action.id, success: false, status: "error", error: thrown }, thrown };
        }
    }

    /**
     * Prefixes messages with `[domain:plugin]` and adds the trace id.
     */
    private pluginLogger(domainId: string, pluginId: string, traceId: string): PluginLogger {
        const prefix = `[${domainId}:${pluginId}]`;
        const forward = (level: keyof PluginLogger) =>
            (message: string, data?: Record<string, unknown>) =>
                this.logger[level](`${prefix} ${message}`, { ...data, traceId });

        return {
            debug: forward("debug"),
            info : forward("info"),
            warn : forward("warn"),
            error: forward("error"),
        };
    }
}
