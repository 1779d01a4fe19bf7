// edge-twin-allocator/src/core/AllocationOptimizer.ts

import { EventEmitter } from 'events';
import { z } from 'zod';
import { CostModel } from './CostModel';
import { OptimizerConfigError } from './errors';
import { Logger } from '../utils/Logger';
import { PRNG, randomChoice, resolvePRNG, round } from '../utils/random';
import {
    AllocationSummary,
    ConvergenceRecord,
    EXECUTION_LOCATIONS,
    ExecutionLocation,
    FitnessBreakdown,
    OptimizationResult,
    OptimizerConfig,
    OptimizerState,
    TaskProfile,
    permittedLocations
} from '../types';
import config from '../config';

const optimizerConfigSchema = z.object({
    populationSize: z.number().int()
        .min(3, 'must be an integer of at least 3 so that three leaders can be drawn'),
    maxIterations: z.number().int().positive('must be a positive integer'),
    w1: z.number().min(0, 'must be within [0, 1]').max(1, 'must be within [0, 1]'),
    seed: z.number().int().optional(),
    edgeNodeIds: z.array(z.string().min(1)).min(1, 'must name at least one edge node').optional()
});

export interface FitnessPenalties {
    latency: number;
    energy: number;
}

export interface FitnessOptions {
    w1: number;
    edgeNodeIds: readonly string[];
    costModel: CostModel;
    penalties: FitnessPenalties;
}

const LOCATION_CODES: Record<ExecutionLocation, number> = {
    local_cache: 0,
    primary_node: 1,
    neighbor_aggregator: 2,
    cloud: 3
};

export function validateOptimizerConfig(input: OptimizerConfig): OptimizerConfig {
    const parsed = optimizerConfigSchema.safeParse(input);
    if (!parsed.success) {
        throw new OptimizerConfigError(
            parsed.error.issues.map(issue => `${issue.path.join('.') || 'config'} ${issue.message}`)
        );
    }
    return parsed.data;
}

/**
 * Weighted fitness of one allocation vector; lower is better.
 *
 * Infeasible tasks contribute the flat penalties and no node load.
 */
export function evaluateFitness(
    allocation: readonly ExecutionLocation[],
    tasks: readonly TaskProfile[],
    options: FitnessOptions
): FitnessBreakdown {
    const { w1, edgeNodeIds, costModel, penalties } = options;
    const nodeIndex = new Map(edgeNodeIds.map((id, index) => [id, index]));
    const nodeLoads: number[] = edgeNodeIds.map(() => 0);

    let totalLatency = 0;
    let totalEnergy = 0;
    let served = 0;

    tasks.forEach((task, i) => {
        const location = allocation[i];
        const latency = costModel.latency(task, location);

        if (costModel.isServiceable(latency)) {
            totalLatency += latency;
            totalEnergy += costModel.energy(task, location);
            served++;

            const node = task.nearestNodeId ? nodeIndex.get(task.nearestNodeId) ?? 0 : 0;
            if (location === 'primary_node') {
                nodeLoads[node] += 1;
            } else if (location === 'neighbor_aggregator') {
                nodeLoads[node] += 2;
            }
        } else {
            totalLatency += penalties.latency;
            totalEnergy += penalties.energy;
        }
    });

    const loadImbalance = standardDeviation(nodeLoads);
    const normalizedLatency = totalLatency / (tasks.length * 100 + 1);

    return {
        fitness: w1 * normalizedLatency + (1 - w1) * loadImbalance,
        totalLatency,
        totalEnergy,
        loadImbalance,
        nodeLoads,
        served
    };
}

function standardDeviation(values: readonly number[]): number {
    const total = values.reduce((sum, v) => sum + v, 0);
    if (total <= 0) {
        return 0;
    }
    const mean = total / values.length;
    const variance = values.reduce((sum, v) => sum + (v - mean) ** 2, 0) / values.length;
    return Math.sqrt(variance);
}

function summarize(allocation: readonly ExecutionLocation[]): AllocationSummary {
    const summary: AllocationSummary = {
        local_cache: 0,
        primary_node: 0,
        neighbor_aggregator: 0,
        cloud: 0
    };
    for (const location of allocation) {
        summary[location]++;
    }
    return summary;
}

function rankAscending(scores: readonly number[]): number[] {
    return scores.map((_, i) => i).sort((a, b) => scores[a] - scores[b]);
}

/**
 * Grey-wolf search over discrete allocation vectors.
 *
 * Three leaders (alpha, beta, delta) pull every other candidate each
 * iteration. Alpha only ever improves; beta and delta follow the current
 * population's runners-up. Emits `iteration` after every round and
 * `converged` with the final result.
 */
export class AllocationOptimizer extends EventEmitter {
    private logger: Logger;
    private currentState: OptimizerState = 'initialized';
    private readonly settings: OptimizerConfig;
    private readonly fitnessOptions: FitnessOptions;

    constructor(
        options: OptimizerConfig,
        costModel: CostModel = new CostModel(),
        penalties: FitnessPenalties = {
            latency: config.optimizer.penaltyLatency,
            energy: config.optimizer.penaltyEnergy
        }
    ) {
        super();
        this.logger = Logger.getInstance().child('AllocationOptimizer');
        this.settings = validateOptimizerConfig(options);
        this.fitnessOptions = {
            w1: this.settings.w1,
            edgeNodeIds: this.settings.edgeNodeIds ?? config.infrastructure.edgeNodes.map(n => n.id),
            costModel,
            penalties
        };
    }

    public get state(): OptimizerState {
        return this.currentState;
    }

    public evaluate(allocation: readonly ExecutionLocation[], tasks: readonly TaskProfile[]): FitnessBreakdown {
        return evaluateFitness(allocation, tasks, this.fitnessOptions);
    }

    public run(tasks: readonly TaskProfile[]): OptimizationResult {
        this.currentState = 'initialized';
        const random = resolvePRNG(this.settings.seed);
        const { populationSize, maxIterations } = this.settings;

        if (tasks.length === 0) {
            const result = this.emptyResult();
            this.currentState = 'converged';
            this.emit('converged', result);
            return result;
        }

        let wolves = Array.from({ length: populationSize }, () => this.randomAllocation(tasks, random));
        let scores = wolves.map(wolf => this.evaluate(wolf, tasks).fitness);
        let order = rankAscending(scores);

        let alpha = [...wolves[order[0]]];
        let beta = [...wolves[order[1]]];
        let delta = [...wolves[order[2]]];
        let alphaFitness = scores[order[0]];

        const convergence: ConvergenceRecord[] = [];
        this.currentState = 'iterating';

        for (let t = 0; t < maxIterations; t++) {
            const a = 2.0 - 2.0 * t / maxIterations;

            wolves = wolves.map(wolf => this.hunt(wolf, [alpha, beta, delta], a, tasks, random));

            // Whole population is scored before any leader moves.
            scores = wolves.map(wolf => this.evaluate(wolf, tasks).fitness);
            order = rankAscending(scores);

            if (scores[order[0]] < alphaFitness) {
                alpha = [...wolves[order[0]]];
                alphaFitness = scores[order[0]];
            }
            beta = [...wolves[order[1]]];
            delta = [...wolves[order[2]]];

            const detail = this.evaluate(alpha, tasks);
            const record: ConvergenceRecord = {
                iteration: t + 1,
                fitness: alphaFitness,
                latency: detail.totalLatency,
                energy: detail.totalEnergy,
                loadImbalance: detail.loadImbalance,
                a: round(a, 4)
            };
            convergence.push(record);
            this.emit('iteration', record, wolves);
        }

        const result: OptimizationResult = {
            bestAllocation: alpha,
            bestFitness: alphaFitness,
            finalMetrics: this.evaluate(alpha, tasks),
            convergence,
            allocationSummary: summarize(alpha)
        };

        this.currentState = 'converged';
        this.logger.debug('Optimization converged', {
            tasks: tasks.length,
            iterations: maxIterations,
            bestFitness: alphaFitness,
            served: result.finalMetrics.served
        });
        this.emit('converged', result);

        return result;
    }

    private randomAllocation(tasks: readonly TaskProfile[], random: PRNG): ExecutionLocation[] {
        return tasks.map(task => randomChoice(random, permittedLocations(task)));
    }

    private hunt(
        wolf: readonly ExecutionLocation[],
        leaders: ReadonlyArray<readonly ExecutionLocation[]>,
        a: number,
        tasks: readonly TaskProfile[],
        random: PRNG
    ): ExecutionLocation[] {
        return tasks.map((task, j) => {
            const current = LOCATION_CODES[wolf[j]];

            const pulls = leaders.map(leader => {
                const r1 = random();
                const r2 = random();
                const A = 2 * a * r1 - a;
                const C = 2 * r2;
                const target = LOCATION_CODES[leader[j]];
                return target - A * Math.abs(C * target - current);
            });

            const mean = pulls.reduce((sum, x) => sum + x, 0) / pulls.length;
            const count = EXECUTION_LOCATIONS.length;
            const candidate = EXECUTION_LOCATIONS[((Math.round(mean) % count) + count) % count];
            const valid = permittedLocations(task);

            return valid.includes(candidate) ? candidate : randomChoice(random, valid);
        });
    }

    private emptyResult(): OptimizationResult {
        return {
            bestAllocation: [],
            bestFitness: 0,
            finalMetrics: {
                fitness: 0,
                totalLatency: 0,
                totalEnergy: 0,
                loadImbalance: 0,
                nodeLoads: this.fitnessOptions.edgeNodeIds.map(() => 0),
                served: 0
            },
            convergence: [],
            allocationSummary: summarize([])
        };
    }
}

export function runOptimizer(
    tasks: readonly TaskProfile[],
    options: OptimizerConfig,
    costModel?: CostModel
): OptimizationResult {
    return new AllocationOptimizer(options, costModel).run(tasks);
}
