import axios, { AxiosInstance, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { ThingFilter, TwinBackend } from '../network/TwinBackend';
import {
    AllocatorConfig,
    NodeRecord,
    PhysicalSnapshot,
    Thing,
    ThingAttributes,
    ThingFeatures,
    VehicleRecord
} from '../types';

export const twinSettings: AllocatorConfig['twin'] = {
    baseUrl: 'http://twin.test',
    namespace: 'org.test',
    policyId: 'org.test:policy',
    username: 'ditto',
    password: 'test-secret',
    probeTimeout: 100,
    requestTimeout: 100,
    forceMemory: false
};

export function vehicle(id: string, overrides: Partial<VehicleRecord> = {}): VehicleRecord {
    return {
        id,
        x: 100,
        y: 200,
        speed: 45,
        connectedNodeId: 'RSU_1',
        taskCount: 2,
        ...overrides
    };
}

export function nodeRecord(id: string, load: number = 0): NodeRecord {
    return {
        id,
        load,
        vehiclesServed: load > 0 ? 1 : 0,
        utilizationPct: load * 5,
        cachedTasks: 0
    };
}

export function physicalSnapshot(
    timeStep: number,
    vehicles: VehicleRecord[],
    nodes: NodeRecord[] = []
): PhysicalSnapshot {
    return { timeStep, source: 'Test', vehicles, nodes };
}

export interface RecordedRequest {
    method: string;
    url: string;
    baseURL: string | undefined;
    body: unknown;
    params: unknown;
}

export interface StubReply {
    status: number;
    data?: unknown;
}

/** Axios instance answered in process by `route`; every request is recorded. */
export function stubHttp(route: (request: RecordedRequest) => StubReply): {
    http: AxiosInstance;
    requests: RecordedRequest[];
} {
    const requests: RecordedRequest[] = [];
    const http = axios.create({
        baseURL: `${twinSettings.baseUrl}/api/2`,
        validateStatus: () => true,
        adapter: async (cfg: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
            const request: RecordedRequest = {
                method: (cfg.method ?? 'get').toUpperCase(),
                url: cfg.url ?? '',
                baseURL: cfg.baseURL,
                body: typeof cfg.data === 'string' ? JSON.parse(cfg.data) : undefined,
                params: cfg.params
            };
            requests.push(request);
            const reply = route(request);
            return {
                data: reply.data ?? '',
                status: reply.status,
                statusText: String(reply.status),
                headers: {},
                config: cfg
            };
        }
    });
    return { http, requests };
}

/** Axios instance whose every request fails at the transport level. */
export function unreachableHttp(): AxiosInstance {
    return axios.create({
        adapter: async (): Promise<AxiosResponse> => {
            throw new Error('connect ECONNREFUSED 127.0.0.1:8080');
        }
    });
}

/** Twin platform kept in a Map. Feature writes can be held back to observe a sync mid-flight. */
export class RecordingBackend implements TwinBackend {
    public readonly name = 'Recording';
    public readonly url = 'http://twin.test/api/2/things';
    public readonly things: Map<string, Thing> = new Map();
    private held: Promise<void> | null = null;
    private release: () => void = () => undefined;

    public holdWrites(): void {
        this.held = new Promise(resolve => {
            this.release = resolve;
        });
    }

    public releaseWrites(): void {
        this.held = null;
        this.release();
    }

    public async prepare(): Promise<boolean> {
        return true;
    }

    public async createThing(thingId: string, attributes: ThingAttributes, features: ThingFeatures): Promise<boolean> {
        if (!this.things.has(thingId)) {
            this.things.set(thingId, { thingId, attributes: { ...attributes }, features: { ...features } });
        }
        return true;
    }

    public async replaceFeatures(thingId: string, features: ThingFeatures): Promise<boolean> {
        if (this.held) {
            await this.held;
        }
        const thing = this.things.get(thingId);
        if (!thing) return false;
        this.things.set(thingId, { ...thing, features });
        return true;
    }

    public async getThing(thingId: string): Promise<Thing | null> {
        return this.things.get(thingId) ?? null;
    }

    public async deleteThing(thingId: string): Promise<boolean> {
        return this.things.delete(thingId);
    }

    public async listThings(filter?: ThingFilter): Promise<Thing[]> {
        const things = Array.from(this.things.values());
        return filter ? things.filter(t => t.attributes[filter.attribute] === filter.equals) : things;
    }
}
