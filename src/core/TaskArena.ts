// edge-twin-allocator/src/core/TaskArena.ts

import { CostModel } from './CostModel';
import { PRNG, randomInt, round, sampleIndices, uniform } from '../utils/random';
import {
    AllocatorConfig,
    ExecutionLocation,
    LOCATION_LABELS,
    OffloadTask,
    TaskView
} from '../types';
import config from '../config';

/**
 * Owns every task by id. Vehicles and the global list only hold ids, so a
 * task is mutated in exactly one place.
 */
export class TaskArena {
    private tasks: Map<string, OffloadTask> = new Map();
    private owners: Map<string, string[]> = new Map();
    private counter: number = 0;

    constructor(
        private readonly random: PRNG = Math.random,
        private readonly settings: AllocatorConfig['tasks'] = config.tasks
    ) {}

    public get size(): number {
        return this.tasks.size;
    }

    /**
     * Create tasks for a vehicle on first sighting; on later sightings point
     * them at the new nearest node and clear the previous allocation.
     */
    public observe(vehicleId: string, nearestNodeId: string | null): OffloadTask[] {
        const existing = this.owners.get(vehicleId);
        if (!existing) {
            const count = randomInt(this.random, this.settings.perVehicleMin, this.settings.perVehicleMax);
            const ids: string[] = [];
            for (let i = 0; i < count; i++) {
                this.counter++;
                const task = this.createTask(`T_${String(this.counter).padStart(4, '0')}`, vehicleId, nearestNodeId);
                this.tasks.set(task.taskId, task);
                ids.push(task.taskId);
            }
            this.owners.set(vehicleId, ids);
            return this.tasksOf(vehicleId);
        }

        for (const id of existing) {
            const task = this.tasks.get(id);
            if (task) {
                task.nearestNodeId = nearestNodeId;
                task.allocation = null;
            }
        }
        return this.tasksOf(vehicleId);
    }

    /** Drop the tasks of every vehicle not in `activeIds`; returns the removed task ids. */
    public retainOwners(activeIds: ReadonlySet<string>): string[] {
        const removed: string[] = [];
        for (const [vehicleId, ids] of this.owners) {
            if (activeIds.has(vehicleId)) continue;
            for (const id of ids) {
                this.tasks.delete(id);
                removed.push(id);
            }
            this.owners.delete(vehicleId);
        }
        return removed;
    }

    /** Redraw the attributes of `count` random tasks, keeping id, owner and nearest node. */
    public resample(count: number): string[] {
        const all = this.list();
        const picked = sampleIndices(this.random, all.length, count).map(i => all[i]);
        for (const old of picked) {
            this.tasks.set(old.taskId, this.createTask(old.taskId, old.vehicleId, old.nearestNodeId));
        }
        return picked.map(t => t.taskId);
    }

    public get(taskId: string): OffloadTask | undefined {
        return this.tasks.get(taskId);
    }

    public tasksOf(vehicleId: string): OffloadTask[] {
        return this.resolve(this.owners.get(vehicleId) ?? []);
    }

    /** Global task order: vehicles in first-seen order, tasks in creation order. */
    public list(): OffloadTask[] {
        return this.resolve(Array.from(this.owners.values()).flat());
    }

    /** Write an allocation vector back positionally over `list()`. */
    public applyAllocation(allocation: readonly ExecutionLocation[], costModel: CostModel): void {
        this.list().forEach((task, i) => {
            const location = allocation[i];
            if (location === undefined) return;
            task.allocation = location;
            task.latencyMs = costModel.latency(task, location);
            task.energyMj = costModel.energy(task, location);
        });
    }

    public views(): TaskView[] {
        return this.list().map(task => ({
            taskId: task.taskId,
            vehicleId: task.vehicleId,
            nearestNodeId: task.nearestNodeId,
            dataSizeKb: round(task.dataSizeKb, 1),
            outputSizeKb: round(task.outputSizeKb, 1),
            computeCycles: task.computeCycles.toExponential(2),
            timeBounded: task.timeBounded,
            allocatedTo: task.allocation ? LOCATION_LABELS[task.allocation] : 'Unassigned',
            latencyMs: round(task.latencyMs, 2),
            energyMj: round(task.energyMj, 2)
        }));
    }

    private resolve(ids: string[]): OffloadTask[] {
        return ids.flatMap(id => {
            const task = this.tasks.get(id);
            return task ? [task] : [];
        });
    }

    private createTask(taskId: string, vehicleId: string, nearestNodeId: string | null): OffloadTask {
        const { dataSizeKb, outputSizeKb, computeCycles, timeBoundedProbability } = this.settings;
        return {
            taskId,
            vehicleId,
            nearestNodeId,
            dataSizeKb: uniform(this.random, dataSizeKb.min, dataSizeKb.max),
            outputSizeKb: uniform(this.random, outputSizeKb.min, outputSizeKb.max),
            computeCycles: uniform(this.random, computeCycles.min, computeCycles.max),
            timeBounded: this.random() < timeBoundedProbability,
            allocation: null,
            latencyMs: 0,
            energyMj: 0
        };
    }
}
