// edge-twin-allocator/src/core/CostModel.ts

import { CostModelParameters, ExecutionLocation, TaskProfile } from '../types';
import { getCostModelConfig } from '../config';

/**
 * Latency (ms) and energy (mJ) of serving a task at an execution location.
 *
 * Transfer terms are `sizeKb / rateMbps * 8`. Unserviceable placements return
 * `infeasibleLatency` instead of failing so candidates stay comparable.
 */
export class CostModel {
    constructor(private readonly params: CostModelParameters = getCostModelConfig()) {}

    public latency(task: TaskProfile, location: ExecutionLocation): number {
        const p = this.params;

        switch (location) {
            case 'local_cache':
                return task.timeBounded ? p.infeasibleLatency : 0;
            case 'primary_node':
                return task.timeBounded ? this.retrievalLatency(task) : p.infeasibleLatency;
            case 'neighbor_aggregator':
                return task.timeBounded
                    ? this.relayLatency(task) + this.retrievalLatency(task)
                    : p.infeasibleLatency;
            case 'cloud':
                return this.offloadLatency(task) + this.executionLatency(task) + this.returnLatency(task);
        }
    }

    // Computed for every location; callers discard it when latency is infeasible.
    public energy(task: TaskProfile, location: ExecutionLocation): number {
        const p = this.params;
        const cacheEnergy = p.cachePower * task.outputSizeKb;

        switch (location) {
            case 'local_cache':
                return cacheEnergy;
            case 'primary_node':
                return cacheEnergy + p.nodePowerMw * this.retrievalLatency(task) / 1000;
            case 'neighbor_aggregator':
                return cacheEnergy
                    + p.aggregatorPowerMw * this.relayLatency(task) / 1000
                    + p.nodePowerMw * this.retrievalLatency(task) / 1000;
            case 'cloud': {
                const clockHz = p.cloudCapacityGhz * 1e9;
                const offloadEnergy = p.cloudPowerMw * this.offloadLatency(task) / 1000;
                const executionEnergy = p.cloudCapacitance * task.computeCycles * clockHz ** 2;
                const returnEnergy = p.cloudPowerMw * this.returnLatency(task) / 1000;
                return offloadEnergy + executionEnergy * 1000 + returnEnergy;
            }
        }
    }

    public isServiceable(latency: number): boolean {
        return latency < this.params.infeasibleThreshold;
    }

    private retrievalLatency(task: TaskProfile): number {
        return (task.outputSizeKb / this.params.rateNodeToVehicle) * 8;
    }

    private relayLatency(task: TaskProfile): number {
        return (task.outputSizeKb / this.params.rateNodeToAggregator) * 8;
    }

    private offloadLatency(task: TaskProfile): number {
        return (task.dataSizeKb / this.params.rateVehicleToCloud) * 8;
    }

    private executionLatency(task: TaskProfile): number {
        return (task.computeCycles / (this.params.cloudCapacityGhz * 1e9)) * 1000;
    }

    private returnLatency(task: TaskProfile): number {
        return (task.outputSizeKb / this.params.rateVehicleToCloud) * 8;
    }
}

const defaultModel = new CostModel();

export function computeTaskLatency(task: TaskProfile, location: ExecutionLocation): number {
    return defaultModel.latency(task, location);
}

export function computeTaskEnergy(task: TaskProfile, location: ExecutionLocation): number {
    return defaultModel.energy(task, location);
}
