// edge-twin-allocator/src/types/optimizer.ts

import { ExecutionLocation } from './task';

export type OptimizerState = 'initialized' | 'iterating' | 'converged';

export interface OptimizerConfig {
    populationSize: number;
    maxIterations: number;
    w1: number;
    seed?: number;
    edgeNodeIds?: string[];
}

export interface FitnessBreakdown {
    fitness: number;
    totalLatency: number;
    totalEnergy: number;
    loadImbalance: number;
    nodeLoads: number[];
    served: number;
}

export interface ConvergenceRecord {
    iteration: number;
    fitness: number;
    latency: number;
    energy: number;
    loadImbalance: number;
    a: number;
}

export type AllocationSummary = Record<ExecutionLocation, number>;

export interface OptimizationResult {
    bestAllocation: ExecutionLocation[];
    bestFitness: number;
    finalMetrics: FitnessBreakdown;
    convergence: ConvergenceRecord[];
    allocationSummary: AllocationSummary;
}
