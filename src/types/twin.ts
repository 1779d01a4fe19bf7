// edge-twin-allocator/src/types/twin.ts

export type TwinKind = 'vehicle' | 'edge_node' | 'aggregator' | 'remote_tier';

export interface VehicleProperties {
    x: number;
    y: number;
    speed: number;
    connectedNodeId: string | null;
    taskCount: number;
}

export interface EdgeNodeProperties {
    x: number;
    y: number;
    coverage: number;
    capacityMhz: number;
    cacheMb: number;
    load: number;
    vehiclesServed: number;
    utilizationPct: number;
    cachedTasks: number;
}

export interface AggregatorProperties {
    x: number;
    y: number;
    coverage: number;
    capacityMhz: number;
    cacheMb: number;
}

export interface RemoteTierProperties {
    capacityGhz: number;
    powerMw: number;
}

export interface TwinPropertiesByKind {
    vehicle: VehicleProperties;
    edge_node: EdgeNodeProperties;
    aggregator: AggregatorProperties;
    remote_tier: RemoteTierProperties;
}

export interface TwinNodeView<K extends TwinKind = TwinKind> {
    kind: K;
    id: string;
    properties: TwinPropertiesByKind[K];
    lastSync: number;
    aoi: number;
    syncCount: number;
}

// Physical-state input, one per cycle.
export interface VehicleRecord {
    id: string;
    x: number;
    y: number;
    speed: number;
    connectedNodeId: string | null;
    taskCount: number;
}

export interface NodeRecord {
    id: string;
    load: number;
    vehiclesServed: number;
    utilizationPct: number;
    cachedTasks: number;
}

export interface PhysicalSnapshot {
    timeStep: number;
    source: string;
    vehicles: VehicleRecord[];
    nodes: NodeRecord[];
}

export interface SyncRecord {
    time: number;
    timeStep: number;
    source: string;
    backend: string;
    vehiclesSynced: number;
    nodesSynced: number;
    backendSynced: number;
    vehiclesRemoved: number;
    avgAoi: number;
    maxAoi: number;
}

export interface SyncStats {
    totalSyncs: number;
    avgAoi: number;
    maxAoi: number;
    vehiclesSynced: number;
    nodesSynced: number;
    backendSynced: number;
    backend: string;
}

export interface TwinSnapshot {
    vehicles: Record<string, TwinNodeView<'vehicle'>>;
    edgeNodes: Record<string, TwinNodeView<'edge_node'>>;
    aggregator: TwinNodeView<'aggregator'>;
    remoteTier: TwinNodeView<'remote_tier'>;
    counts: {
        vehicles: number;
        edgeNodes: number;
        total: number;
    };
    totalSyncs: number;
    uptime: number;
    backend: string;
}

export interface AoiSample {
    step: number;
    avgAoi: number;
}

export interface NodeLoad {
    load: number;
    vehiclesServed: number;
    utilizationPct: number;
}

// Twin platform "things".
export type ThingValue = string | number | boolean | null;

export interface ThingFeature {
    properties: Record<string, ThingValue>;
}

export type ThingFeatures = Record<string, ThingFeature>;

export type ThingAttributes = Record<string, ThingValue>;

export interface Thing {
    thingId: string;
    policyId?: string;
    attributes: ThingAttributes;
    features: ThingFeatures;
}

export interface BackendStatus {
    connected: boolean;
    backend: string;
    thingsCount: number;
    things: string[];
    url: string | null;
}
