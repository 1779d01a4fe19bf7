// edge-twin-allocator/src/network/things.ts

import { AllocatorConfig, NodeRecord, ThingAttributes, ThingFeatures, VehicleRecord } from '../types';
import { round } from '../utils/random';

export interface ThingDefinition {
    thingId: string;
    attributes: ThingAttributes;
    features: ThingFeatures;
}

function syncFeature(syncTime: number): ThingFeatures {
    return {
        sync: {
            properties: {
                last_sync: round(syncTime, 3),
                timestamp: Date.now() / 1000
            }
        }
    };
}

export function vehicleFeatures(vehicle: VehicleRecord, syncTime: number): ThingFeatures {
    return {
        position: { properties: { x: round(vehicle.x, 1), y: round(vehicle.y, 1) } },
        mobility: { properties: { speed_kmh: round(vehicle.speed, 1) } },
        connectivity: { properties: { connected_node: vehicle.connectedNodeId } },
        tasks: { properties: { count: vehicle.taskCount } },
        ...syncFeature(syncTime)
    };
}

export function edgeNodeFeatures(node: NodeRecord, syncTime: number): ThingFeatures {
    return {
        load: {
            properties: {
                current_load: node.load,
                utilization_pct: round(node.utilizationPct, 1)
            }
        },
        serving: { properties: { vehicles_served: node.vehiclesServed } },
        cache: { properties: { cached_tasks: node.cachedTasks } },
        ...syncFeature(syncTime)
    };
}

/** Things registered once per backend: edge nodes, the aggregator, the remote tier. */
export function infrastructureThings(infrastructure: AllocatorConfig['infrastructure']): ThingDefinition[] {
    const { edgeNodes, aggregator, remoteTier } = infrastructure;
    const idleSync = { sync: { properties: { last_sync: 0, timestamp: 0 } } };

    return [
        ...edgeNodes.map(node => ({
            thingId: node.id,
            attributes: {
                type: 'edge_node',
                x: node.x,
                y: node.y,
                coverage: node.coverage,
                capacity_mhz: node.capacityMhz,
                cache_mb: node.cacheMb
            },
            features: {
                load: { properties: { current_load: 0, utilization_pct: 0 } },
                serving: { properties: { vehicles_served: 0 } },
                cache: { properties: { cached_tasks: 0 } },
                ...idleSync
            }
        })),
        {
            thingId: aggregator.id,
            attributes: {
                type: 'aggregator',
                x: aggregator.x,
                y: aggregator.y,
                coverage: aggregator.coverage,
                capacity_mhz: aggregator.capacityMhz,
                cache_mb: aggregator.cacheMb
            },
            features: {
                load: { properties: { current_load: 0 } },
                ...idleSync
            }
        },
        {
            thingId: remoteTier.id,
            attributes: {
                type: 'remote_tier',
                capacity_ghz: remoteTier.capacityGhz,
                power_mw: remoteTier.powerMw
            },
            features: {
                utilization: { properties: { current_pct: 0 } },
                ...idleSync
            }
        }
    ];
}
