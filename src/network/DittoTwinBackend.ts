// edge-twin-allocator/src/network/DittoTwinBackend.ts

import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { Logger } from '../utils/Logger';
import { AllocatorConfig, Thing, ThingAttributes, ThingFeatures } from '../types';
import { ProbeResult, ThingFilter, TwinBackend } from './TwinBackend';

export type DittoOptions = Pick<
    AllocatorConfig['twin'],
    'baseUrl' | 'namespace' | 'policyId' | 'username' | 'password' | 'probeTimeout' | 'requestTimeout'
>;

interface SearchResponse {
    items?: Thing[];
}

function isSuccess(response: AxiosResponse, accepted: number[] = [200, 201, 204]): boolean {
    return accepted.includes(response.status);
}

/**
 * Eclipse Ditto HTTP API (v2). Things live under `{namespace}:{id}`; ids are
 * handed back without the namespace prefix.
 */
export class DittoTwinBackend implements TwinBackend {
    public readonly name = 'Eclipse Ditto';
    private logger: Logger;
    private http: AxiosInstance;

    constructor(private readonly options: DittoOptions, http?: AxiosInstance) {
        this.logger = Logger.getInstance().child('DittoTwinBackend');
        this.http = http ?? axios.create({
            baseURL: `${options.baseUrl}/api/2`,
            timeout: options.requestTimeout,
            auth: { username: options.username, password: options.password },
            headers: { 'Content-Type': 'application/json' },
            validateStatus: () => true // Don't throw on any status code
        });
    }

    /** Health-check the platform once; never throws. */
    public static async probe(options: DittoOptions, http?: AxiosInstance): Promise<ProbeResult> {
        const backend = new DittoTwinBackend(options, http);
        try {
            const status = await backend.checkHealth();
            if (status === 200) {
                return { ok: true, backend };
            }
            return { ok: false, reason: `Health check returned ${status}` };
        } catch (error) {
            return { ok: false, reason: error instanceof Error ? error.message : String(error) };
        }
    }

    public get url(): string {
        return `${this.options.baseUrl}/api/2/things`;
    }

    public async checkHealth(): Promise<number> {
        const response = await this.http.get('/health', {
            baseURL: this.options.baseUrl,
            timeout: this.options.probeTimeout
        });
        return response.status;
    }

    public async prepare(): Promise<boolean> {
        const policy = {
            policyId: this.options.policyId,
            entries: {
                owner: {
                    subjects: {
                        [`nginx:${this.options.username}`]: { type: 'nginx basic auth user' }
                    },
                    resources: {
                        'thing:/': { grant: ['READ', 'WRITE'], revoke: [] },
                        'policy:/': { grant: ['READ', 'WRITE'], revoke: [] },
                        'message:/': { grant: ['READ', 'WRITE'], revoke: [] }
                    }
                }
            }
        };
        const response = await this.http.put(`/policies/${this.options.policyId}`, policy);
        // 409: policy already exists
        if (!isSuccess(response, [200, 201, 204, 409])) {
            this.logger.warn(`Policy creation returned ${response.status}`, {
                policyId: this.options.policyId
            });
            return false;
        }
        return true;
    }

    public async createThing(
        thingId: string,
        attributes: ThingAttributes,
        features: ThingFeatures
    ): Promise<boolean> {
        const fullId = this.qualify(thingId);
        const response = await this.http.put(`/things/${fullId}`, {
            thingId: fullId,
            policyId: this.options.policyId,
            attributes,
            features
        });
        // 409: thing already exists
        if (!isSuccess(response, [200, 201, 204, 409])) {
            this.logger.debug(`Create thing ${thingId} returned ${response.status}`);
            return false;
        }
        return true;
    }

    public async replaceFeatures(thingId: string, features: ThingFeatures): Promise<boolean> {
        const response = await this.http.put(`/things/${this.qualify(thingId)}/features`, features);
        return isSuccess(response);
    }

    public async getThing(thingId: string): Promise<Thing | null> {
        const response = await this.http.get<Thing>(`/things/${this.qualify(thingId)}`);
        return response.status === 200 ? this.unqualify(response.data) : null;
    }

    public async deleteThing(thingId: string): Promise<boolean> {
        const response = await this.http.delete(`/things/${this.qualify(thingId)}`);
        return isSuccess(response, [200, 204]);
    }

    public async listThings(filter?: ThingFilter): Promise<Thing[]> {
        const params = filter
            ? { filter: `eq(attributes/${filter.attribute},${JSON.stringify(filter.equals)})` }
            : {};
        const response = await this.http.get<SearchResponse>('/search/things', { params });
        if (response.status !== 200) {
            return [];
        }
        return (response.data.items ?? []).map(thing => this.unqualify(thing));
    }

    private qualify(thingId: string): string {
        return `${this.options.namespace}:${thingId}`;
    }

    private unqualify(thing: Thing): Thing {
        const prefix = `${this.options.namespace}:`;
        return {
            ...thing,
            thingId: thing.thingId.startsWith(prefix) ? thing.thingId.slice(prefix.length) : thing.thingId,
            attributes: thing.attributes ?? {},
            features: thing.features ?? {}
        };
    }
}
