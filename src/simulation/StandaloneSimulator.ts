// edge-twin-allocator/src/simulation/StandaloneSimulator.ts

import { TaskArena } from '../core/TaskArena';
import { Logger } from '../utils/Logger';
import { PRNG, round, uniform } from '../utils/random';
import {
    AllocatorConfig,
    EdgeNodeSpec,
    NodeRecord,
    PhysicalSnapshot,
    Point,
    VehicleRecord
} from '../types';
import config from '../config';

export interface PhysicalSource {
    step(): PhysicalSnapshot;
}

interface SimVehicle extends Point {
    id: string;
    speed: number; // km/h
    heading: number; // rad
    connectedNodeId: string | null;
}

export interface SimulatorOptions {
    random?: PRNG;
    vehicles?: number;
    settings?: AllocatorConfig['simulation'];
    edgeNodes?: EdgeNodeSpec[];
}

// Tasks per node at which utilisation reads 100%
const FULL_LOAD = 20;

export function findNearestNode<T extends Point>(point: Point, nodes: readonly T[]): T | null {
    let nearest: T | null = null;
    let best = Infinity;
    for (const node of nodes) {
        const distance = Math.hypot(node.x - point.x, node.y - point.y);
        if (distance < best) {
            best = distance;
            nearest = node;
        }
    }
    return nearest;
}

/**
 * Built-in physical layer: vehicles wander a bounded area, attach to their
 * nearest edge node and carry tasks held in the arena.
 */
export class StandaloneSimulator implements PhysicalSource {
    private logger: Logger;
    private timeStep: number = 0;
    private vehicles: SimVehicle[] = [];
    private nextVehicle: number = 0;
    private readonly random: PRNG;
    private readonly settings: AllocatorConfig['simulation'];
    private readonly edgeNodes: EdgeNodeSpec[];

    constructor(private readonly arena: TaskArena, options: SimulatorOptions = {}) {
        this.logger = Logger.getInstance().child('StandaloneSimulator');
        this.random = options.random ?? Math.random;
        this.settings = options.settings ?? config.simulation;
        this.edgeNodes = options.edgeNodes ?? config.infrastructure.edgeNodes;

        const count = options.vehicles ?? this.settings.vehicles;
        for (let i = 0; i < count; i++) {
            this.addVehicle();
        }
    }

    public get currentStep(): number {
        return this.timeStep;
    }

    public addVehicle(): string {
        const { bounds, speedKmh } = this.settings;
        const vehicle: SimVehicle = {
            id: `v_${this.nextVehicle++}`,
            x: uniform(this.random, bounds.xMin, bounds.xMax),
            y: uniform(this.random, bounds.yMin, bounds.yMax),
            speed: uniform(this.random, speedKmh.min, speedKmh.max),
            heading: uniform(this.random, 0, 2 * Math.PI),
            connectedNodeId: null
        };
        vehicle.connectedNodeId = findNearestNode(vehicle, this.edgeNodes)?.id ?? null;
        this.vehicles.push(vehicle);
        this.arena.observe(vehicle.id, vehicle.connectedNodeId);
        return vehicle.id;
    }

    public removeVehicle(vehicleId: string): boolean {
        const before = this.vehicles.length;
        this.vehicles = this.vehicles.filter(v => v.id !== vehicleId);
        return this.vehicles.length < before;
    }

    public step(): PhysicalSnapshot {
        this.timeStep++;

        const served = new Map<string, string[]>(this.edgeNodes.map(n => [n.id, []]));
        const cached = new Map<string, number>(this.edgeNodes.map(n => [n.id, 0]));

        for (const vehicle of this.vehicles) {
            this.move(vehicle, 1.0);
            vehicle.connectedNodeId = findNearestNode(vehicle, this.edgeNodes)?.id ?? null;
            if (!vehicle.connectedNodeId) continue;

            served.get(vehicle.connectedNodeId)?.push(vehicle.id);
            // Allocations from the previous cycle, read before they are reset
            const cachedHere = this.arena.tasksOf(vehicle.id)
                .filter(t => t.allocation === 'local_cache').length;
            cached.set(vehicle.connectedNodeId, (cached.get(vehicle.connectedNodeId) ?? 0) + cachedHere);
        }

        const departed = this.arena.retainOwners(new Set(this.vehicles.map(v => v.id)));
        if (departed.length > 0) {
            this.logger.debug(`Dropped ${departed.length} tasks of departed vehicles`);
        }
        for (const vehicle of this.vehicles) {
            this.arena.observe(vehicle.id, vehicle.connectedNodeId);
        }

        if (this.settings.churnInterval > 0 && this.timeStep % this.settings.churnInterval === 0) {
            const count = Math.max(1, Math.floor(this.arena.size / 5));
            const resampled = this.arena.resample(count);
            this.logger.debug(`Resampled ${resampled.length} tasks`, { step: this.timeStep });
        }

        return {
            timeStep: this.timeStep,
            source: 'Standalone',
            vehicles: this.vehicles.map(v => this.vehicleRecord(v)),
            nodes: this.edgeNodes.map(node => {
                const vehicleIds = served.get(node.id) ?? [];
                return this.nodeRecord(node.id, vehicleIds, cached.get(node.id) ?? 0);
            })
        };
    }

    private move(vehicle: SimVehicle, dt: number): void {
        const { bounds } = this.settings;
        const speedMs = vehicle.speed * 1000 / 3600;

        vehicle.heading += uniform(this.random, -0.15, 0.15);
        vehicle.x += speedMs * Math.cos(vehicle.heading) * dt;
        vehicle.y += speedMs * Math.sin(vehicle.heading) * dt;

        // Reflect off the area bounds
        if (vehicle.x < bounds.xMin || vehicle.x > bounds.xMax) {
            vehicle.heading = Math.PI - vehicle.heading;
            vehicle.x = Math.min(Math.max(vehicle.x, bounds.xMin), bounds.xMax);
        }
        if (vehicle.y < bounds.yMin || vehicle.y > bounds.yMax) {
            vehicle.heading = -vehicle.heading;
            vehicle.y = Math.min(Math.max(vehicle.y, bounds.yMin), bounds.yMax);
        }
    }

    private vehicleRecord(vehicle: SimVehicle): VehicleRecord {
        return {
            id: vehicle.id,
            x: round(vehicle.x, 1),
            y: round(vehicle.y, 1),
            speed: round(vehicle.speed, 1),
            connectedNodeId: vehicle.connectedNodeId,
            taskCount: this.arena.tasksOf(vehicle.id).length
        };
    }

    private nodeRecord(nodeId: string, vehicleIds: string[], cachedTasks: number): NodeRecord {
        const load = vehicleIds.reduce((sum, id) => sum + this.arena.tasksOf(id).length, 0);
        return {
            id: nodeId,
            load,
            vehiclesServed: vehicleIds.length,
            utilizationPct: round(Math.min(load / FULL_LOAD * 100, 100), 1),
            cachedTasks
        };
    }
}
