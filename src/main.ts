#!/usr/bin/env node
// edge-twin-allocator/src/main.ts

import fs from 'fs';
import { CycleDriver } from './core/CycleDriver';
import { TaskArena } from './core/TaskArena';
import { TwinStore } from './core/TwinStore';
import { CycleFeedServer } from './network/CycleFeedServer';
import { StandaloneSimulator } from './simulation/StandaloneSimulator';
import { Logger } from './utils/Logger';
import { resolvePRNG } from './utils/random';
import { AllocatorConfig } from './types';
import config, { configIssues, getOptimizerConfig, getSimulationConfig, getTaskConfig } from './config';

const logger = Logger.getInstance();
logger.setContext('Main');

interface Runtime {
    driver: CycleDriver;
    feed: CycleFeedServer | null;
}

function validateConfig(cfg: AllocatorConfig = config, envIssues: readonly string[] = configIssues): void {
    if (envIssues.length > 0) {
        throw new Error(envIssues.join('; '));
    }

    const { optimizer, tasks, simulation, feed } = cfg;

    if (optimizer.populationSize < 3) {
        throw new Error(`Population size must be at least 3, got ${optimizer.populationSize}`);
    }

    if (optimizer.maxIterations < 1) {
        throw new Error(`Max iterations must be positive, got ${optimizer.maxIterations}`);
    }

    if (optimizer.w1 < 0 || optimizer.w1 > 1) {
        throw new Error(`Weight w1 must be within [0, 1], got ${optimizer.w1}`);
    }

    if (tasks.timeBoundedProbability < 0 || tasks.timeBoundedProbability > 1) {
        throw new Error(`Time-bounded probability must be within [0, 1], got ${tasks.timeBoundedProbability}`);
    }

    if (tasks.perVehicleMin < 0 || tasks.perVehicleMin >= tasks.perVehicleMax) {
        throw new Error(
            `Tasks per vehicle range is empty: [${tasks.perVehicleMin}, ${tasks.perVehicleMax})`
        );
    }

    if (simulation.steps < 1 || simulation.vehicles < 0) {
        throw new Error('Simulation needs at least one step and a non-negative vehicle count');
    }

    if (feed.enabled && (feed.port < 1024 || feed.port > 65535)) {
        throw new Error('Port must be between 1024 and 65535');
    }
}

async function main(): Promise<void> {
    let runtime: Runtime | null = null;

    try {
        validateConfig();

        const simulation = getSimulationConfig();
        const optimizer = getOptimizerConfig();
        logger.info('Starting allocation engine with configuration:', {
            vehicles: simulation.vehicles,
            steps: simulation.steps,
            population: optimizer.populationSize,
            iterations: optimizer.maxIterations,
            w1: optimizer.w1
        });

        const random = resolvePRNG(simulation.seed);
        const arena = new TaskArena(random, getTaskConfig());
        const simulator = new StandaloneSimulator(arena, { random, settings: simulation });
        const twinStore = await TwinStore.create();
        const driver = new CycleDriver(simulator, arena, twinStore);

        let feed: CycleFeedServer | null = null;
        if (config.feed.enabled) {
            feed = new CycleFeedServer(twinStore);
            await feed.start();
            feed.attach(driver);
        }
        runtime = { driver, feed };

        const active = runtime;
        process.on('SIGTERM', () => {
            logger.info('Received SIGTERM signal');
            active.driver.stop();
        });

        process.on('SIGINT', () => {
            logger.info('Received SIGINT signal');
            active.driver.stop();
        });

        process.on('unhandledRejection', (reason: unknown) => {
            logger.error('Unhandled rejection', reason instanceof Error ? reason : new Error(String(reason)));
            active.driver.stop();
        });

        logger.info(`Twin backend: ${twinStore.backendName}`);
        await driver.run(simulation.steps, simulation.stepInterval);

        const summary = driver.summary();
        logger.info('Run complete', { ...summary });

        if (config.resultsFile) {
            const results = {
                summary,
                reports: driver.getReports(),
                tasks: arena.views(),
                twins: twinStore.snapshot(),
                backend: await twinStore.backendStatus()
            };
            fs.writeFileSync(config.resultsFile, JSON.stringify(results, null, 2));
            logger.info(`Results written to ${config.resultsFile}`);
        }

        await shutdown(runtime);
    } catch (error) {
        logger.error('Allocation engine failed', error as Error);
        if (runtime) {
            await shutdown(runtime);
        }
        process.exitCode = 1;
    }
}

async function shutdown(runtime: Runtime): Promise<void> {
    logger.info('Initiating graceful shutdown...');
    runtime.driver.stop();

    try {
        if (runtime.feed) {
            await runtime.feed.stop();
        }
        logger.info('Allocation engine stopped successfully');
    } catch (error) {
        logger.error('Error during shutdown', error as Error);
        process.exitCode = 1;
    }
}

// Execute main function if this is the entry point
if (require.main === module) {
    main()
        .then(() => logger.flush())
        .catch(error => {
            logger.error('Fatal error in main process', error as Error);
            process.exit(1);
        });
}

export { main, validateConfig };
