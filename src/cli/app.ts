import type { OrchestratorConfig } from "../shared/config.js";
import type { Stores } from "../shared/services/task-store.js";
import type { GenerationProviders, MediaComposer } from "../shared/types/pipeline.types.js";
import type { TaskEvent } from "../shared/types/task.types.js";
import { createMemoryStores } from "../shared/services/memory-stores.js";
import { createPostgresStores } from "../shared/services/postgres-stores.js";
import { createOfflineComposer, createOfflineProviders } from "../shared/services/offline-providers.js";
import { PipelineRegistry } from "../pipeline/pipeline-runner.js";
import { createDocumentToVideoPipeline } from "../pipeline/document-to-video.js";
import { TaskScheduler } from "../pipeline/services/task-scheduler.js";
import { logger as rootLogger } from "../shared/logger.js";
import type { Logger } from "../shared/logger.js";



export interface App {
    config: OrchestratorConfig;
    stores: Stores;
    registry: PipelineRegistry;
    scheduler: TaskScheduler;
    close(): Promise<void>;
}

export interface AppOverrides {
    stores?: Stores;
    providers?: GenerationProviders;
    composer?: MediaComposer;
    publishTaskEvent?: (event: TaskEvent) => Promise<void>;
    logger?: Logger;
}

export async function openStores(config: OrchestratorConfig): Promise<Stores> {
    if (config.store.backend === "memory") return createMemoryStores();
    if (!config.store.postgresUrl) throw new Error("POSTGRES_URL is required for the postgres store");
    return createPostgresStores(config.store.postgresUrl);
}

/**
 * Wires stores, the document-to-video pipeline and the scheduler from config.
 * Providers default to the offline stand-ins.
 */
export async function createApp(config: OrchestratorConfig, overrides: AppOverrides = {}): Promise<App> {
    const stores = overrides.stores ?? await openStores(config);
    const registry = new PipelineRegistry().register(createDocumentToVideoPipeline({
        providers: overrides.providers ?? createOfflineProviders(),
        composer: overrides.composer ?? createOfflineComposer(),
        units: stores.units,
        supervision: config.supervision,
        pipeline: config.pipeline,
    }));
    const scheduler = new TaskScheduler({
        stores,
        registry,
        config: config.scheduler,
        publishTaskEvent: overrides.publishTaskEvent,
        logger: overrides.logger ?? rootLogger,
    });

    return {
        config,
        stores,
        registry,
        scheduler,
        async close() {
            await scheduler.stop();
            await stores.close();
        },
    };
}
