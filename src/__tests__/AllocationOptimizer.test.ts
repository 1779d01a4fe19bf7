import { describe, it, expect } from 'vitest';
import {
    AllocationOptimizer,
    evaluateFitness,
    runOptimizer,
    validateOptimizerConfig
} from '../core/AllocationOptimizer';
import { CostModel } from '../core/CostModel';
import { OptimizerConfigError } from '../core/errors';
import { ConvergenceRecord, ExecutionLocation, TaskProfile, isPermittedLocation } from '../types';

const NODES = ['RSU_1', 'RSU_2', 'RSU_3'];
const penalties = { latency: 500, energy: 100 };
const costModel = new CostModel();

function makeTasks(): TaskProfile[] {
    return [
        { dataSizeKb: 800, outputSizeKb: 120, computeCycles: 2e9, timeBounded: true, nearestNodeId: 'RSU_1' },
        { dataSizeKb: 2400, outputSizeKb: 600, computeCycles: 4e9, timeBounded: false, nearestNodeId: 'RSU_1' },
        { dataSizeKb: 300, outputSizeKb: 50, computeCycles: 1.5e9, timeBounded: true, nearestNodeId: 'RSU_2' },
        { dataSizeKb: 1500, outputSizeKb: 900, computeCycles: 3e9, timeBounded: true, nearestNodeId: 'RSU_3' },
        { dataSizeKb: 1000, outputSizeKb: 200, computeCycles: 2.5e9, timeBounded: false, nearestNodeId: 'RSU_2' },
        { dataSizeKb: 2000, outputSizeKb: 400, computeCycles: 1e9, timeBounded: true, nearestNodeId: 'RSU_3' },
        { dataSizeKb: 500, outputSizeKb: 80, computeCycles: 4.5e9, timeBounded: true, nearestNodeId: null }
    ];
}

describe('validateOptimizerConfig', () => {
    it('accepts a well-formed configuration', () => {
        expect(validateOptimizerConfig({ populationSize: 3, maxIterations: 1, w1: 0 })).toEqual({
            populationSize: 3,
            maxIterations: 1,
            w1: 0
        });
    });

    it('rejects populations too small to hold three leaders', () => {
        expect(() => new AllocationOptimizer({ populationSize: 2, maxIterations: 5, w1: 0.5 }))
            .toThrow(OptimizerConfigError);
    });

    it('lists every offending field', () => {
        try {
            validateOptimizerConfig({ populationSize: 10, maxIterations: 0, w1: 1.5 });
            expect.unreachable();
        } catch (error) {
            expect(error).toBeInstanceOf(OptimizerConfigError);
            if (error instanceof OptimizerConfigError) {
                expect(error.issues).toEqual([
                    'maxIterations must be a positive integer',
                    'w1 must be within [0, 1]'
                ]);
            }
        }
    });

    it('validates before looking at the tasks', () => {
        expect(() => runOptimizer([], { populationSize: 10, maxIterations: 5, w1: -0.1 }))
            .toThrow('Invalid optimizer configuration: w1 must be within [0, 1]');
    });
});

describe('evaluateFitness', () => {
    const options = { w1: 0.5, edgeNodeIds: NODES, costModel, penalties };
    const urgent: TaskProfile = { dataSizeKb: 1000, outputSizeKb: 100, computeCycles: 3e9, timeBounded: true };

    it('charges one unit of load for primary placement and two for neighbour placement', () => {
        const tasks = [
            { ...urgent, nearestNodeId: 'RSU_2' },
            { ...urgent, nearestNodeId: 'RSU_3' }
        ];
        const result = evaluateFitness(['primary_node', 'neighbor_aggregator'], tasks, options);

        expect(result.nodeLoads).toEqual([0, 1, 2]);
        expect(result.loadImbalance).toBeCloseTo(Math.sqrt(2 / 3), 12);
        expect(result.served).toBe(2);
        // 16 + 20 over 2*100+1
        expect(result.fitness).toBeCloseTo(0.5 * 36 / 201 + 0.5 * Math.sqrt(2 / 3), 12);
    });

    it('books tasks without a known nearest node on the first node', () => {
        const tasks = [
            { ...urgent, nearestNodeId: 'RSU_9' },
            { ...urgent, nearestNodeId: null },
            { ...urgent }
        ];
        const result = evaluateFitness(['primary_node', 'primary_node', 'primary_node'], tasks, options);
        expect(result.nodeLoads).toEqual([3, 0, 0]);
    });

    it('adds penalties but no node load for infeasible placements', () => {
        const tasks = [
            { ...urgent, nearestNodeId: 'RSU_1' },
            { ...urgent, nearestNodeId: 'RSU_1' }
        ];
        const result = evaluateFitness(['local_cache', 'local_cache'], tasks, options);

        expect(result.served).toBe(0);
        expect(result.totalLatency).toBe(1000);
        expect(result.totalEnergy).toBe(200);
        // Both tasks sit on RSU_1 yet the imbalance term stays at zero.
        expect(result.nodeLoads).toEqual([0, 0, 0]);
        expect(result.loadImbalance).toBe(0);
        expect(result.fitness).toBeCloseTo(0.5 * 1000 / 201, 12);
    });

    it('ignores load balance entirely when w1 is 0 and placements are infeasible', () => {
        const tasks = [{ ...urgent, nearestNodeId: 'RSU_1' }];
        const result = evaluateFitness(['local_cache'], tasks, { ...options, w1: 0 });
        expect(result.fitness).toBe(0);
    });
});

describe('AllocationOptimizer', () => {
    it('keeps every candidate inside its permitted locations at every iteration', () => {
        const tasks = makeTasks();
        const optimizer = new AllocationOptimizer(
            { populationSize: 12, maxIterations: 15, w1: 0.5, seed: 7, edgeNodeIds: NODES },
            costModel
        );
        let checked = 0;

        optimizer.on('iteration', (_record: ConvergenceRecord, wolves: ExecutionLocation[][]) => {
            expect(wolves).toHaveLength(12);
            for (const wolf of wolves) {
                wolf.forEach((location, j) => {
                    expect(isPermittedLocation(tasks[j], location)).toBe(true);
                });
            }
            checked++;
        });

        const result = optimizer.run(tasks);

        expect(checked).toBe(15);
        result.bestAllocation.forEach((location, j) => {
            expect(isPermittedLocation(tasks[j], location)).toBe(true);
        });
    });

    it('never lets the tracked best fitness regress', () => {
        const result = runOptimizer(makeTasks(), {
            populationSize: 8,
            maxIterations: 25,
            w1: 0.3,
            seed: 11,
            edgeNodeIds: NODES
        });

        const trace = result.convergence.map(r => r.fitness);
        expect(trace).toHaveLength(25);
        for (let i = 0; i < trace.length; i++) {
            expect(trace[i]).toBeGreaterThanOrEqual(0);
            if (i > 0) {
                expect(trace[i]).toBeLessThanOrEqual(trace[i - 1]);
            }
        }
        expect(result.bestFitness).toBe(trace[trace.length - 1]);
        expect(result.finalMetrics.fitness).toBe(result.bestFitness);
    });

    it('is deterministic under a fixed seed', () => {
        const options = { populationSize: 10, maxIterations: 20, w1: 0.6, seed: 1234, edgeNodeIds: NODES };
        const first = runOptimizer(makeTasks(), options);
        const second = runOptimizer(makeTasks(), options);

        expect(second.bestAllocation).toEqual(first.bestAllocation);
        expect(second.bestFitness).toBe(first.bestFitness);
        expect(second.convergence).toEqual(first.convergence);
    });

    it('records the decaying coefficient for each iteration', () => {
        const result = runOptimizer(makeTasks(), {
            populationSize: 5,
            maxIterations: 4,
            w1: 0.5,
            seed: 3,
            edgeNodeIds: NODES
        });
        expect(result.convergence.map(r => r.a)).toEqual([2, 1.5, 1, 0.5]);
        expect(result.convergence.map(r => r.iteration)).toEqual([1, 2, 3, 4]);
    });

    it('allocates five identical time-bounded tasks end to end', () => {
        const task: TaskProfile = {
            dataSizeKb: 1200,
            outputSizeKb: 300,
            computeCycles: 2e9,
            timeBounded: true,
            nearestNodeId: 'RSU_1'
        };
        const tasks = Array.from({ length: 5 }, () => ({ ...task }));

        const result = runOptimizer(tasks, {
            populationSize: 10,
            maxIterations: 5,
            w1: 1.0,
            seed: 42,
            edgeNodeIds: NODES
        });

        const summary = result.allocationSummary;
        const nonLocal = result.bestAllocation.filter(l => l !== 'local_cache').length;

        expect(result.convergence).toHaveLength(5);
        expect(summary.local_cache + summary.primary_node + summary.neighbor_aggregator + summary.cloud).toBe(5);
        expect(summary.local_cache).toBe(0);
        expect(result.finalMetrics.served).toBe(nonLocal);
        expect(result.finalMetrics.served).toBe(5);
    });

    it('returns an empty result for an empty task list', () => {
        const optimizer = new AllocationOptimizer({ populationSize: 10, maxIterations: 50, w1: 0.5, edgeNodeIds: NODES });
        let converged = 0;
        optimizer.on('converged', () => converged++);

        const result = optimizer.run([]);

        expect(result.bestAllocation).toEqual([]);
        expect(result.convergence).toEqual([]);
        expect(result.bestFitness).toBe(0);
        expect(result.finalMetrics.nodeLoads).toEqual([0, 0, 0]);
        expect(result.allocationSummary).toEqual({
            local_cache: 0,
            primary_node: 0,
            neighbor_aggregator: 0,
            cloud: 0
        });
        expect(optimizer.state).toBe('converged');
        expect(converged).toBe(1);
    });

    it('moves through its states', () => {
        const optimizer = new AllocationOptimizer({ populationSize: 4, maxIterations: 2, w1: 0.5, seed: 5 });
        const states: string[] = [optimizer.state];
        optimizer.on('iteration', () => states.push(optimizer.state));
        optimizer.run(makeTasks());
        states.push(optimizer.state);

        expect(states).toEqual(['initialized', 'iterating', 'iterating', 'converged']);
    });
});
