// edge-twin-allocator/src/core/TwinStore.ts

import { EventEmitter } from 'events';
import { AxiosInstance } from 'axios';
import { TwinNode } from './TwinNode';
import { TwinBackend } from '../network/TwinBackend';
import { DittoTwinBackend } from '../network/DittoTwinBackend';
import { edgeNodeFeatures, infrastructureThings, vehicleFeatures } from '../network/things';
import { Logger } from '../utils/Logger';
import { round } from '../utils/random';
import {
    AllocatorConfig,
    AoiSample,
    BackendStatus,
    NodeLoad,
    PhysicalSnapshot,
    SyncRecord,
    SyncStats,
    Thing,
    TwinNodeView,
    TwinSnapshot,
    VehicleProperties,
    VehicleRecord
} from '../types';
import { getInfrastructureConfig, getTwinConfig } from '../config';

export interface TwinStoreOptions {
    infrastructure?: AllocatorConfig['infrastructure'];
    // Seconds; defaults to wall-clock time.
    clock?: () => number;
}

export interface TwinStoreFactoryOptions extends TwinStoreOptions {
    twin?: AllocatorConfig['twin'];
    http?: AxiosInstance;
}

export interface VehiclePosition {
    id: string;
    x: number;
    y: number;
    speed: number;
    connectedNodeId: string | null;
}

function vehicleProperties(record: VehicleRecord): VehicleProperties {
    return {
        x: record.x,
        y: record.y,
        speed: record.speed,
        connectedNodeId: record.connectedNodeId,
        taskCount: record.taskCount
    };
}

function mean(values: number[]): number {
    return values.reduce((sum, v) => sum + v, 0) / values.length;
}

const MEMORY_BACKEND = 'In-Memory';

/**
 * Freshness-tracked mirror of the physical environment.
 *
 * In-memory twins are the source of truth for callers. When a twin platform
 * was reachable at construction, each sync is also mirrored there after the
 * in-memory state is complete; without one the store runs in memory only.
 * Backend failures only lower `backendSynced` for that sync.
 */
export class TwinStore extends EventEmitter {
    private logger: Logger;
    private vehicleTwins: Map<string, TwinNode<'vehicle'>> = new Map();
    private edgeNodeTwins: Map<string, TwinNode<'edge_node'>> = new Map();
    private aggregatorTwin: TwinNode<'aggregator'>;
    private remoteTierTwin: TwinNode<'remote_tier'>;
    private syncLog: SyncRecord[] = [];
    private totalSyncs: number = 0;
    private readonly clock: () => number;
    private readonly creationTime: number;
    private readonly infrastructure: AllocatorConfig['infrastructure'];

    constructor(
        private readonly backend: TwinBackend | null,
        options: TwinStoreOptions = {}
    ) {
        super();
        this.logger = Logger.getInstance().child('TwinStore');
        this.clock = options.clock ?? (() => Date.now() / 1000);
        this.creationTime = this.clock();
        this.infrastructure = options.infrastructure ?? getInfrastructureConfig();

        const { edgeNodes, aggregator, remoteTier } = this.infrastructure;
        for (const node of edgeNodes) {
            this.edgeNodeTwins.set(node.id, new TwinNode('edge_node', node.id, {
                x: node.x,
                y: node.y,
                coverage: node.coverage,
                capacityMhz: node.capacityMhz,
                cacheMb: node.cacheMb,
                load: 0,
                vehiclesServed: 0,
                utilizationPct: 0,
                cachedTasks: 0
            }));
        }
        this.aggregatorTwin = new TwinNode('aggregator', aggregator.id, {
            x: aggregator.x,
            y: aggregator.y,
            coverage: aggregator.coverage,
            capacityMhz: aggregator.capacityMhz,
            cacheMb: aggregator.cacheMb
        });
        this.remoteTierTwin = new TwinNode('remote_tier', remoteTier.id, {
            capacityGhz: remoteTier.capacityGhz,
            powerMw: remoteTier.powerMw
        });
    }

    /**
     * Probe the twin platform once and fall back to memory for the store's
     * lifetime if it cannot be reached. Never throws.
     */
    public static async create(options: TwinStoreFactoryOptions = {}): Promise<TwinStore> {
        const logger = Logger.getInstance().child('TwinStore');
        const twin = options.twin ?? getTwinConfig();
        let backend: TwinBackend | null = null;

        if (twin.forceMemory) {
            logger.info('Twin platform disabled, using in-memory backend');
        } else {
            const probe = await DittoTwinBackend.probe(twin, options.http);
            if (probe.ok) {
                backend = probe.backend;
            } else {
                logger.warn('Twin platform not reachable, using in-memory backend', {
                    url: twin.baseUrl,
                    reason: probe.reason
                });
            }
        }

        const store = new TwinStore(backend, options);
        await store.initialize();
        logger.info(`Backend: ${store.backendName}`, {
            edgeNodes: store.edgeNodeTwins.size
        });
        return store;
    }

    /** Register infrastructure things with the backend. Best-effort. */
    public async initialize(): Promise<void> {
        const backend = this.backend;
        if (!backend) return;

        try {
            await backend.prepare();
        } catch (error) {
            this.logger.warn('Backend preparation failed', { reason: (error as Error).message });
        }

        const results = await Promise.allSettled(
            infrastructureThings(this.infrastructure).map(thing =>
                backend.createThing(thing.thingId, thing.attributes, thing.features)
            )
        );
        const registered = results.filter(r => r.status === 'fulfilled' && r.value).length;
        this.logger.debug(`Registered ${registered}/${results.length} infrastructure things`);
    }

    public get backendName(): string {
        return this.backend?.name ?? MEMORY_BACKEND;
    }

    public async sync(snapshot: PhysicalSnapshot, now: number = this.clock()): Promise<SyncRecord> {
        const syncTime = now - this.creationTime;

        const record: SyncRecord = {
            time: round(syncTime, 3),
            timeStep: snapshot.timeStep,
            source: snapshot.source || 'unknown',
            backend: this.backendName,
            vehiclesSynced: 0,
            nodesSynced: 0,
            backendSynced: 0,
            vehiclesRemoved: 0,
            avgAoi: 0,
            maxAoi: 0
        };

        // Vehicles
        const created = new Set<string>();
        for (const vehicle of snapshot.vehicles) {
            let twin = this.vehicleTwins.get(vehicle.id);
            if (!twin) {
                twin = new TwinNode('vehicle', vehicle.id, vehicleProperties(vehicle));
                this.vehicleTwins.set(vehicle.id, twin);
                created.add(vehicle.id);
            }
            twin.update(vehicleProperties(vehicle), syncTime);
            record.vehiclesSynced++;
        }

        // Edge nodes are fixed; unknown ids are not created
        const knownNodes = snapshot.nodes.filter(node => this.edgeNodeTwins.has(node.id));
        for (const node of knownNodes) {
            const twin = this.edgeNodeTwins.get(node.id);
            if (!twin) continue;
            twin.update({
                ...twin.properties,
                load: node.load,
                vehiclesServed: node.vehiclesServed,
                utilizationPct: node.utilizationPct,
                cachedTasks: node.cachedTasks
            }, syncTime);
            record.nodesSynced++;
        }
        if (knownNodes.length < snapshot.nodes.length) {
            this.logger.debug('Ignored unknown node records', {
                ignored: snapshot.nodes.length - knownNodes.length
            });
        }

        // Remove departed vehicles
        const activeIds = new Set(snapshot.vehicles.map(v => v.id));
        const stale = Array.from(this.vehicleTwins.keys()).filter(id => !activeIds.has(id));
        for (const id of stale) {
            this.vehicleTwins.delete(id);
        }
        record.vehiclesRemoved = stale.length;

        // AoI
        const aois = [
            ...Array.from(this.vehicleTwins.values(), twin => twin.aoi),
            ...Array.from(this.edgeNodeTwins.values(), twin => twin.aoi)
        ];
        record.avgAoi = aois.length ? round(mean(aois), 4) : 0;
        record.maxAoi = aois.length ? round(Math.max(...aois), 4) : 0;

        // In-memory state is complete; the backend only sees it from here on
        const backend = this.backend;
        if (backend) {
            record.backendSynced = await this.mirror(backend, snapshot, knownNodes.map(n => n.id), created, syncTime);
            await this.deleteFromBackend(backend, stale);
        }

        this.totalSyncs++;
        this.syncLog.push(record);
        this.emit('synced', record);

        return record;
    }

    private async mirror(
        backend: TwinBackend,
        snapshot: PhysicalSnapshot,
        nodeIds: string[],
        created: Set<string>,
        syncTime: number
    ): Promise<number> {
        const nodesById = new Map(snapshot.nodes.map(node => [node.id, node]));

        const writes: Promise<boolean>[] = [
            ...snapshot.vehicles.map(async vehicle => {
                if (created.has(vehicle.id)) {
                    await backend.createThing(vehicle.id, { type: 'vehicle', id: vehicle.id }, {});
                }
                return backend.replaceFeatures(vehicle.id, vehicleFeatures(vehicle, syncTime));
            }),
            ...nodeIds.flatMap(id => {
                const node = nodesById.get(id);
                return node ? [backend.replaceFeatures(id, edgeNodeFeatures(node, syncTime))] : [];
            })
        ];

        const results = await Promise.allSettled(writes);
        const failures = results.filter(r => r.status === 'rejected').length;
        if (failures > 0) {
            this.logger.debug(`Backend write failed for ${failures} things`, { backend: backend.name });
        }
        return results.filter(r => r.status === 'fulfilled' && r.value).length;
    }

    private async deleteFromBackend(backend: TwinBackend, ids: string[]): Promise<void> {
        if (ids.length === 0) return;
        const results = await Promise.allSettled(ids.map(id => backend.deleteThing(id)));
        const failed = results.filter(r => r.status === 'rejected' || !r.value).length;
        if (failed > 0) {
            this.logger.debug(`Backend delete skipped for ${failed} departed vehicles`);
        }
    }

    public snapshot(): TwinSnapshot {
        const vehicles: Record<string, TwinNodeView<'vehicle'>> = {};
        for (const [id, twin] of this.vehicleTwins) {
            vehicles[id] = twin.toView();
        }
        const edgeNodes: Record<string, TwinNodeView<'edge_node'>> = {};
        for (const [id, twin] of this.edgeNodeTwins) {
            edgeNodes[id] = twin.toView();
        }

        return {
            vehicles,
            edgeNodes,
            aggregator: this.aggregatorTwin.toView(),
            remoteTier: this.remoteTierTwin.toView(),
            counts: {
                vehicles: this.vehicleTwins.size,
                edgeNodes: this.edgeNodeTwins.size,
                total: this.vehicleTwins.size + this.edgeNodeTwins.size + 2
            },
            totalSyncs: this.totalSyncs,
            uptime: round(this.clock() - this.creationTime, 1),
            backend: this.backendName
        };
    }

    public stats(): SyncStats {
        const latest = this.syncLog[this.syncLog.length - 1];
        if (!latest) {
            return {
                totalSyncs: 0,
                avgAoi: 0,
                maxAoi: 0,
                vehiclesSynced: 0,
                nodesSynced: 0,
                backendSynced: 0,
                backend: this.backendName
            };
        }
        return {
            totalSyncs: this.totalSyncs,
            avgAoi: latest.avgAoi,
            maxAoi: latest.maxAoi,
            vehiclesSynced: latest.vehiclesSynced,
            nodesSynced: latest.nodesSynced,
            backendSynced: latest.backendSynced,
            backend: this.backendName
        };
    }

    public aoiHistory(): AoiSample[] {
        return this.syncLog.map(s => ({ step: s.timeStep, avgAoi: s.avgAoi }));
    }

    public edgeNodeIds(): string[] {
        return Array.from(this.edgeNodeTwins.keys());
    }

    public nodeLoads(): Record<string, NodeLoad> {
        const loads: Record<string, NodeLoad> = {};
        for (const [id, twin] of this.edgeNodeTwins) {
            loads[id] = {
                load: twin.properties.load,
                vehiclesServed: twin.properties.vehiclesServed,
                utilizationPct: twin.properties.utilizationPct
            };
        }
        return loads;
    }

    public vehiclePositions(): VehiclePosition[] {
        return Array.from(this.vehicleTwins.values(), twin => ({
            id: twin.id,
            x: twin.properties.x,
            y: twin.properties.y,
            speed: twin.properties.speed,
            connectedNodeId: twin.properties.connectedNodeId
        }));
    }

    public async backendStatus(): Promise<BackendStatus> {
        const backend = this.backend;
        if (!backend) {
            const things = [
                ...this.vehicleTwins.keys(),
                ...this.edgeNodeTwins.keys(),
                this.aggregatorTwin.id,
                this.remoteTierTwin.id
            ];
            return {
                connected: false,
                backend: MEMORY_BACKEND,
                thingsCount: things.length,
                things,
                url: null
            };
        }

        try {
            const things = await backend.listThings();
            return {
                connected: true,
                backend: backend.name,
                thingsCount: things.length,
                things: things.map(t => t.thingId),
                url: backend.url
            };
        } catch (error) {
            this.logger.warn('Failed to list backend things', { reason: (error as Error).message });
            return {
                connected: true,
                backend: `${backend.name} (error)`,
                thingsCount: 0,
                things: [],
                url: backend.url
            };
        }
    }

    /** Read one thing back from the twin platform; null in memory mode, when absent or unreachable. */
    public async verifyThing(thingId: string): Promise<Thing | null> {
        if (!this.backend) return null;
        try {
            return await this.backend.getThing(thingId);
        } catch (error) {
            this.logger.debug(`Failed to read thing ${thingId}`, { reason: (error as Error).message });
            return null;
        }
    }
}
