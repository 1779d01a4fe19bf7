import { describe, it, expect } from 'vitest';
import { CostModel, computeTaskEnergy, computeTaskLatency } from '../core/CostModel';
import { CostModelParameters, TaskProfile } from '../types';

const params: CostModelParameters = {
    rateNodeToVehicle: 50,
    rateNodeToAggregator: 200,
    rateVehicleToCloud: 20,
    cachePower: 0.01,
    nodePowerMw: 200,
    aggregatorPowerMw: 300,
    cloudCapacityGhz: 15,
    cloudPowerMw: 400,
    cloudCapacitance: 1e-28,
    infeasibleLatency: 9999,
    infeasibleThreshold: 9000
};

const urgent: TaskProfile = {
    dataSizeKb: 1000,
    outputSizeKb: 100,
    computeCycles: 3e9,
    timeBounded: true
};

const relaxed: TaskProfile = { ...urgent, timeBounded: false };

describe('CostModel latency', () => {
    const model = new CostModel(params);

    it('serves relaxed tasks from the local cache at zero latency', () => {
        expect(model.latency(relaxed, 'local_cache')).toBe(0);
    });

    it('charges the node-to-vehicle transfer at the primary node', () => {
        expect(model.latency(urgent, 'primary_node')).toBe(100 / 50 * 8);
    });

    it('adds the aggregator relay to the retrieval for neighbour placement', () => {
        // 100/200*8 + 100/50*8
        expect(model.latency(urgent, 'neighbor_aggregator')).toBe(20);
    });

    it('sums offload, execution and return for the cloud', () => {
        // 1000/20*8 + 3e9/15e9*1000 + 100/20*8
        expect(model.latency(urgent, 'cloud')).toBeCloseTo(640, 9);
        expect(model.latency(relaxed, 'cloud')).toBeCloseTo(640, 9);
    });

    it('returns the sentinel for placements a task cannot use', () => {
        expect(model.latency(urgent, 'local_cache')).toBe(9999);
        expect(model.latency(relaxed, 'primary_node')).toBe(9999);
        expect(model.latency(relaxed, 'neighbor_aggregator')).toBe(9999);
    });

    it('treats latencies at or above the threshold as unserviceable', () => {
        expect(model.isServiceable(8999.9)).toBe(true);
        expect(model.isServiceable(9000)).toBe(false);
        expect(model.isServiceable(model.latency(urgent, 'local_cache'))).toBe(false);
    });

    it('honours overridden rates', () => {
        const fast = new CostModel({ ...params, rateNodeToVehicle: 100 });
        expect(fast.latency(urgent, 'primary_node')).toBe(8);
    });
});

describe('CostModel energy', () => {
    const model = new CostModel(params);

    it('charges only cache power locally', () => {
        expect(model.energy(relaxed, 'local_cache')).toBeCloseTo(1, 9);
    });

    it('adds node transmit energy at the primary node', () => {
        // 0.01*100 + 200*16/1000
        expect(model.energy(urgent, 'primary_node')).toBeCloseTo(4.2, 9);
    });

    it('adds aggregator and node transmit energy for neighbour placement', () => {
        // 1 + 300*4/1000 + 200*16/1000
        expect(model.energy(urgent, 'neighbor_aggregator')).toBeCloseTo(5.4, 9);
    });

    it('includes dynamic execution energy in the cloud', () => {
        // 400*400/1000 + 1e-28*3e9*(15e9)^2*1000 + 400*40/1000
        expect(model.energy(urgent, 'cloud')).toBeCloseTo(160 + 67500 + 16, 3);
    });
});

describe('default cost functions', () => {
    it('apply the configured parameters', () => {
        expect(computeTaskLatency(relaxed, 'local_cache')).toBe(0);
        expect(computeTaskLatency(urgent, 'primary_node')).toBe(16);
        expect(computeTaskLatency(urgent, 'local_cache')).toBe(9999);
        expect(computeTaskEnergy(relaxed, 'local_cache')).toBeCloseTo(1, 9);
    });
});
