// edge-twin-allocator/src/core/CycleDriver.ts

import { EventEmitter } from 'events';
import { AllocationOptimizer } from './AllocationOptimizer';
import { CostModel } from './CostModel';
import { TaskArena } from './TaskArena';
import { TwinStore } from './TwinStore';
import { PhysicalSource } from '../simulation/StandaloneSimulator';
import { Logger } from '../utils/Logger';
import { round } from '../utils/random';
import { CycleReport, CycleSummary, OptimizerConfig } from '../types';
import config from '../config';

export interface CycleDriverOptions {
    optimizer?: Omit<OptimizerConfig, 'edgeNodeIds'>;
    costModel?: CostModel;
}

/**
 * Runs allocation cycles one after another:
 * snapshot -> twin sync -> optimisation -> allocation written back to tasks.
 */
export class CycleDriver extends EventEmitter {
    private logger: Logger;
    private inProgress: boolean = false;
    private stopped: boolean = false;
    private reports: CycleReport[] = [];
    private readonly optimizerConfig: Omit<OptimizerConfig, 'edgeNodeIds'>;
    private readonly costModel: CostModel;

    constructor(
        private readonly source: PhysicalSource,
        private readonly arena: TaskArena,
        private readonly twinStore: TwinStore,
        options: CycleDriverOptions = {}
    ) {
        super();
        this.logger = Logger.getInstance().child('CycleDriver');
        this.optimizerConfig = options.optimizer ?? {
            populationSize: config.optimizer.populationSize,
            maxIterations: config.optimizer.maxIterations,
            w1: config.optimizer.w1,
            seed: config.optimizer.seed
        };
        this.costModel = options.costModel ?? new CostModel();
    }

    public async step(): Promise<CycleReport> {
        if (this.inProgress) {
            throw new Error('Cycle already in progress');
        }
        this.inProgress = true;

        const timerId = `cycle_${this.reports.length + 1}`;
        this.logger.startTimer(timerId);
        const started = Date.now();

        try {
            const snapshot = this.source.step();
            const sync = await this.twinStore.sync(snapshot);

            const tasks = this.arena.list();
            const optimizer = new AllocationOptimizer(
                { ...this.optimizerConfig, edgeNodeIds: this.twinStore.edgeNodeIds() },
                this.costModel
            );
            const result = optimizer.run(tasks);
            this.arena.applyAllocation(result.bestAllocation, this.costModel);

            const report: CycleReport = {
                step: snapshot.timeStep,
                vehicles: snapshot.vehicles.length,
                tasks: tasks.length,
                fitness: round(result.bestFitness, 4),
                latencyMs: round(result.finalMetrics.totalLatency, 1),
                energyMj: round(result.finalMetrics.totalEnergy, 1),
                loadImbalance: round(result.finalMetrics.loadImbalance, 4),
                served: result.finalMetrics.served,
                avgAoi: sync.avgAoi,
                maxAoi: sync.maxAoi,
                backendSynced: sync.backendSynced,
                allocation: result.allocationSummary,
                durationMs: Date.now() - started
            };

            this.reports.push(report);
            this.logger.info(
                `Step ${report.step} | vehicles ${report.vehicles} | tasks ${report.tasks} | ` +
                `fitness ${report.fitness} | latency ${report.latencyMs}ms | ` +
                `load imbalance ${report.loadImbalance} | AoI ${report.avgAoi}s`
            );
            this.logger.logMetric('cycle_duration', report.durationMs, 'ms');
            this.emit('cycle_completed', report, result);

            return report;
        } finally {
            this.logger.endTimer(timerId);
            this.inProgress = false;
        }
    }

    /** Run up to `steps` cycles sequentially; `stop()` ends the loop after the current cycle. */
    public async run(steps: number, intervalMs: number = 0): Promise<CycleReport[]> {
        this.stopped = false;
        const completed: CycleReport[] = [];

        for (let i = 0; i < steps && !this.stopped; i++) {
            completed.push(await this.step());
            if (intervalMs > 0 && i < steps - 1) {
                await new Promise(resolve => setTimeout(resolve, intervalMs));
            }
        }

        return completed;
    }

    public stop(): void {
        this.stopped = true;
    }

    public getReports(): CycleReport[] {
        return [...this.reports];
    }

    public summary(): CycleSummary {
        const count = this.reports.length;
        const average = (pick: (r: CycleReport) => number) =>
            count ? this.reports.reduce((sum, r) => sum + pick(r), 0) / count : 0;

        return {
            cycles: count,
            avgFitness: round(average(r => r.fitness), 4),
            avgLatencyMs: round(average(r => r.latencyMs), 1),
            avgEnergyMj: round(average(r => r.energyMj), 1),
            totalSyncs: this.twinStore.stats().totalSyncs,
            lastAllocation: count ? this.reports[count - 1].allocation : null
        };
    }
}
