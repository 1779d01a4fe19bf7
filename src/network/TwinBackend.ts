// edge-twin-allocator/src/network/TwinBackend.ts

import { Thing, ThingAttributes, ThingFeatures, ThingValue } from '../types';

export interface ThingFilter {
    attribute: string;
    equals: ThingValue;
}

/**
 * CRUD contract over named things. Every call is best-effort: `false`,
 * `null` or an empty list mean "not synced", never a fatal condition.
 */
export interface TwinBackend {
    readonly name: string;
    readonly url: string | null;

    // Provision whatever the backend needs before things can be written.
    prepare(): Promise<boolean>;
    createThing(thingId: string, attributes: ThingAttributes, features: ThingFeatures): Promise<boolean>;
    replaceFeatures(thingId: string, features: ThingFeatures): Promise<boolean>;
    getThing(thingId: string): Promise<Thing | null>;
    deleteThing(thingId: string): Promise<boolean>;
    listThings(filter?: ThingFilter): Promise<Thing[]>;
}

export type ProbeResult =
    | { ok: true; backend: TwinBackend }
    | { ok: false; reason: string };
