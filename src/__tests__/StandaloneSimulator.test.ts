import { describe, it, expect, vi } from 'vitest';
import { StandaloneSimulator, findNearestNode } from '../simulation/StandaloneSimulator';
import { TaskArena } from '../core/TaskArena';
import { AllocatorConfig } from '../types';
import { createPRNG } from '../utils/random';

const simulation: AllocatorConfig['simulation'] = {
    vehicles: 3,
    steps: 10,
    stepInterval: 0,
    churnInterval: 5,
    bounds: { xMin: 0, xMax: 1500, yMin: 0, yMax: 1500 },
    speedKmh: { min: 30, max: 80 }
};

const tasks: AllocatorConfig['tasks'] = {
    perVehicleMin: 1,
    perVehicleMax: 4,
    dataSizeKb: { min: 200, max: 3000 },
    outputSizeKb: { min: 20, max: 1000 },
    computeCycles: { min: 1e9, max: 5e9 },
    timeBoundedProbability: 0.6
};

const midpoint = () => 0.5;

describe('findNearestNode', () => {
    const nodes = [
        { id: 'A', x: 0, y: 0 },
        { id: 'B', x: 100, y: 0 }
    ];

    it('picks the closest node', () => {
        expect(findNearestNode({ x: 70, y: 10 }, nodes)?.id).toBe('B');
    });

    it('returns null without nodes', () => {
        expect(findNearestNode({ x: 0, y: 0 }, [])).toBeNull();
    });
});

describe('StandaloneSimulator', () => {
    it('seeds the arena with tasks for every vehicle', () => {
        const arena = new TaskArena(midpoint, tasks);
        new StandaloneSimulator(arena, { random: midpoint, settings: simulation });

        // Midpoint draws give two tasks per vehicle.
        expect(arena.size).toBe(6);
        expect(arena.tasksOf('v_2').map(t => t.nearestNodeId)).toEqual(['RSU_3', 'RSU_3']);
    });

    it('reports vehicles and the load on their nearest node', () => {
        const arena = new TaskArena(midpoint, tasks);
        const simulator = new StandaloneSimulator(arena, { random: midpoint, settings: simulation });

        const snapshot = simulator.step();

        expect(snapshot.timeStep).toBe(1);
        expect(snapshot.source).toBe('Standalone');
        expect(snapshot.vehicles.map(v => v.id)).toEqual(['v_0', 'v_1', 'v_2']);
        // Heading pi from the centre of the area, 55 km/h for one second.
        expect(snapshot.vehicles[0]).toEqual({
            id: 'v_0',
            x: 734.7,
            y: 750,
            speed: 55,
            connectedNodeId: 'RSU_3',
            taskCount: 2
        });
        expect(snapshot.nodes).toEqual([
            { id: 'RSU_1', load: 0, vehiclesServed: 0, utilizationPct: 0, cachedTasks: 0 },
            { id: 'RSU_2', load: 0, vehiclesServed: 0, utilizationPct: 0, cachedTasks: 0 },
            { id: 'RSU_3', load: 6, vehiclesServed: 3, utilizationPct: 30, cachedTasks: 0 }
        ]);
        expect(simulator.currentStep).toBe(1);
    });

    it('counts the previous cycle\'s cached tasks per node', () => {
        const arena = new TaskArena(midpoint, { ...tasks, timeBoundedProbability: 0 });
        const simulator = new StandaloneSimulator(arena, { random: midpoint, settings: simulation, vehicles: 2 });
        simulator.step();
        for (const task of arena.list()) {
            task.allocation = 'local_cache';
        }

        const cached = simulator.step();
        const reset = simulator.step();

        expect(cached.nodes[2].cachedTasks).toBe(4);
        expect(reset.nodes[2].cachedTasks).toBe(0);
    });

    it('keeps vehicles inside the area', () => {
        const random = createPRNG(9);
        const arena = new TaskArena(random, tasks);
        const simulator = new StandaloneSimulator(arena, {
            random,
            vehicles: 10,
            settings: { ...simulation, speedKmh: { min: 5000, max: 9000 } }
        });

        for (let i = 0; i < 50; i++) {
            for (const vehicle of simulator.step().vehicles) {
                expect(vehicle.x).toBeGreaterThanOrEqual(0);
                expect(vehicle.x).toBeLessThanOrEqual(1500);
                expect(vehicle.y).toBeGreaterThanOrEqual(0);
                expect(vehicle.y).toBeLessThanOrEqual(1500);
            }
        }
    });

    it('drops the tasks of removed vehicles and seeds new arrivals', () => {
        const arena = new TaskArena(midpoint, tasks);
        const simulator = new StandaloneSimulator(arena, { random: midpoint, settings: simulation });

        expect(simulator.removeVehicle('v_1')).toBe(true);
        expect(simulator.removeVehicle('v_1')).toBe(false);
        const id = simulator.addVehicle();
        const snapshot = simulator.step();

        expect(id).toBe('v_3');
        expect(snapshot.vehicles.map(v => v.id)).toEqual(['v_0', 'v_2', 'v_3']);
        expect(arena.tasksOf('v_1')).toEqual([]);
        expect(arena.size).toBe(6);
    });

    it('resamples a fifth of the tasks on churn steps', () => {
        const arena = new TaskArena(midpoint, tasks);
        const simulator = new StandaloneSimulator(arena, { random: midpoint, settings: simulation, vehicles: 5 });
        const resample = vi.spyOn(arena, 'resample');

        for (let i = 0; i < 10; i++) {
            simulator.step();
        }

        // 10 tasks, so 2 per churn
        expect(resample).toHaveBeenCalledTimes(2);
        expect(resample).toHaveBeenNthCalledWith(1, 2);
    });

    it('never resamples when churn is disabled', () => {
        const arena = new TaskArena(midpoint, tasks);
        const simulator = new StandaloneSimulator(arena, {
            random: midpoint,
            settings: { ...simulation, churnInterval: 0 }
        });
        const resample = vi.spyOn(arena, 'resample');

        for (let i = 0; i < 6; i++) {
            simulator.step();
        }

        expect(resample).not.toHaveBeenCalled();
    });
});
