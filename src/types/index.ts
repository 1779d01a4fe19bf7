// src/types/index.ts

export * from './task';
export * from './twin';
export * from './optimizer';
export * from './network';

export interface Point {
    x: number;
    y: number;
}

export interface EdgeNodeSpec extends Point {
    id: string;
    coverage: number;
    capacityMhz: number;
    cacheMb: number;
}

export type AggregatorSpec = EdgeNodeSpec;

export interface RemoteTierSpec {
    id: string;
    capacityGhz: number;
    powerMw: number;
}

export interface CostModelParameters {
    rateNodeToVehicle: number;
    rateNodeToAggregator: number;
    rateVehicleToCloud: number;
    cachePower: number;
    nodePowerMw: number;
    aggregatorPowerMw: number;
    cloudCapacityGhz: number;
    cloudPowerMw: number;
    cloudCapacitance: number;
    infeasibleLatency: number;
    infeasibleThreshold: number;
}

export interface Range {
    min: number;
    max: number;
}

export interface AllocatorConfig {
    app: {
        name: string;
        environment: string;
    };
    logging: {
        level: string;
        dir: string;
        toFile: boolean;
    };
    costModel: CostModelParameters;
    infrastructure: {
        edgeNodes: EdgeNodeSpec[];
        aggregator: AggregatorSpec;
        remoteTier: RemoteTierSpec;
    };
    tasks: {
        perVehicleMin: number;
        perVehicleMax: number;
        dataSizeKb: Range;
        outputSizeKb: Range;
        computeCycles: Range;
        timeBoundedProbability: number;
    };
    optimizer: {
        populationSize: number;
        maxIterations: number;
        w1: number;
        seed?: number;
        penaltyLatency: number;
        penaltyEnergy: number;
    };
    twin: {
        baseUrl: string;
        namespace: string;
        policyId: string;
        username: string;
        password: string;
        probeTimeout: number;
        requestTimeout: number;
        forceMemory: boolean;
    };
    simulation: {
        vehicles: number;
        steps: number;
        stepInterval: number;
        churnInterval: number;
        bounds: { xMin: number; xMax: number; yMin: number; yMax: number };
        speedKmh: Range;
        seed?: number;
    };
    feed: {
        enabled: boolean;
        port: number;
    };
    resultsFile?: string;
}
