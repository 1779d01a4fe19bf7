// edge-twin-allocator/src/config/index.ts

import dotenv from 'dotenv';
import path from 'path';
import { AllocatorConfig } from '../types';

// Load environment variables
dotenv.config({ path: path.join(process.cwd(), '.env') });

// Malformed values fall back to the default and are reported by validateConfig()
export const configIssues: string[] = [];

function parseIntEnv(key: string, fallback: number): number {
    const raw = process.env[key];
    if (raw === undefined || raw === '') {
        return fallback;
    }
    const value = parseInt(raw, 10);
    if (Number.isNaN(value)) {
        configIssues.push(`Invalid integer for ${key}: ${raw}`);
        return fallback;
    }
    return value;
}

function parseFloatEnv(key: string, fallback: number): number {
    const raw = process.env[key];
    if (raw === undefined || raw === '') {
        return fallback;
    }
    const value = parseFloat(raw);
    if (Number.isNaN(value)) {
        configIssues.push(`Invalid number for ${key}: ${raw}`);
        return fallback;
    }
    return value;
}

function parseOptionalIntEnv(key: string): number | undefined {
    const raw = process.env[key];
    if (raw === undefined || raw === '') {
        return undefined;
    }
    const value = parseInt(raw, 10);
    if (Number.isNaN(value)) {
        configIssues.push(`Invalid integer for ${key}: ${raw}`);
        return undefined;
    }
    return value;
}

function parseBoolEnv(key: string, fallback: boolean): boolean {
    const raw = process.env[key];
    if (raw === undefined || raw === '') {
        return fallback;
    }
    if (raw !== 'true' && raw !== 'false') {
        configIssues.push(`Invalid boolean for ${key}: ${raw}. Must be 'true' or 'false'`);
        return fallback;
    }
    return raw === 'true';
}

const namespace = process.env.TWIN_NAMESPACE || 'org.eclipse.ditto';

export const config: AllocatorConfig = {
    app: {
        name: 'edge-twin-allocator',
        environment: process.env.NODE_ENV || 'development'
    },
    logging: {
        level: process.env.LOG_LEVEL || 'info',
        dir: process.env.LOG_DIR || './logs',
        toFile: parseBoolEnv('LOG_TO_FILE', true)
    },
    costModel: {
        // Mbps
        rateNodeToVehicle: parseFloatEnv('RATE_NODE_TO_VEHICLE', 50),
        rateNodeToAggregator: parseFloatEnv('RATE_NODE_TO_AGGREGATOR', 200),
        rateVehicleToCloud: parseFloatEnv('RATE_VEHICLE_TO_CLOUD', 20),
        cachePower: parseFloatEnv('CACHE_POWER', 0.01), // W/KB
        nodePowerMw: parseFloatEnv('NODE_POWER_MW', 200),
        aggregatorPowerMw: parseFloatEnv('AGGREGATOR_POWER_MW', 300),
        cloudCapacityGhz: parseFloatEnv('CLOUD_CAPACITY_GHZ', 15),
        cloudPowerMw: parseFloatEnv('CLOUD_POWER_MW', 400),
        cloudCapacitance: parseFloatEnv('CLOUD_CAPACITANCE', 1e-28),
        infeasibleLatency: 9999,
        infeasibleThreshold: 9000
    },
    infrastructure: {
        edgeNodes: [
            { id: 'RSU_1', x: 250, y: 250, coverage: 450, capacityMhz: 3000, cacheMb: 512 },
            { id: 'RSU_2', x: 1250, y: 250, coverage: 450, capacityMhz: 3000, cacheMb: 512 },
            { id: 'RSU_3', x: 750, y: 1250, coverage: 450, capacityMhz: 3000, cacheMb: 512 }
        ],
        aggregator: { id: 'MBS_1', x: 750, y: 750, coverage: 1200, capacityMhz: 10000, cacheMb: 2048 },
        remoteTier: { id: 'CLOUD', capacityGhz: 15, powerMw: 400 }
    },
    tasks: {
        perVehicleMin: parseIntEnv('TASKS_PER_VEHICLE_MIN', 1),
        perVehicleMax: parseIntEnv('TASKS_PER_VEHICLE_MAX', 4),
        dataSizeKb: { min: 200, max: 3000 },
        outputSizeKb: { min: 20, max: 1000 },
        computeCycles: { min: 1e9, max: 5e9 },
        timeBoundedProbability: parseFloatEnv('TIME_BOUNDED_PROB', 0.6)
    },
    optimizer: {
        populationSize: parseIntEnv('OPTIMIZER_POPULATION', 30),
        maxIterations: parseIntEnv('OPTIMIZER_MAX_ITERATIONS', 100),
        w1: parseFloatEnv('OPTIMIZER_W1', 0.5),
        seed: parseOptionalIntEnv('OPTIMIZER_SEED'),
        penaltyLatency: 500,
        penaltyEnergy: 100
    },
    twin: {
        baseUrl: process.env.TWIN_BACKEND_URL || 'http://localhost:8080',
        namespace,
        policyId: process.env.TWIN_POLICY_ID || `${namespace}:iov-policy`,
        username: process.env.TWIN_USERNAME || 'ditto',
        password: process.env.TWIN_PASSWORD || 'ditto',
        probeTimeout: parseIntEnv('TWIN_PROBE_TIMEOUT', 5000),
        requestTimeout: parseIntEnv('TWIN_REQUEST_TIMEOUT', 3000),
        forceMemory: parseBoolEnv('TWIN_FORCE_MEMORY', false)
    },
    simulation: {
        vehicles: parseIntEnv('SIM_VEHICLES', 50),
        steps: parseIntEnv('SIM_STEPS', 10),
        stepInterval: parseIntEnv('SIM_STEP_INTERVAL', 0),
        churnInterval: parseIntEnv('SIM_CHURN_INTERVAL', 5),
        bounds: { xMin: 0, xMax: 1500, yMin: 0, yMax: 1500 },
        speedKmh: { min: 30, max: 80 },
        seed: parseOptionalIntEnv('SIM_SEED')
    },
    feed: {
        enabled: parseBoolEnv('FEED_ENABLED', false),
        port: parseIntEnv('FEED_PORT', 8090)
    },
    resultsFile: process.env.RESULTS_FILE || undefined
};

// Export specific configuration getters
export function getCostModelConfig() {
    return config.costModel;
}

export function getInfrastructureConfig() {
    return config.infrastructure;
}

export function getTaskConfig() {
    return config.tasks;
}

export function getOptimizerConfig() {
    return config.optimizer;
}

export function getTwinConfig() {
    return config.twin;
}

export function getSimulationConfig() {
    return config.simulation;
}

export default config;
