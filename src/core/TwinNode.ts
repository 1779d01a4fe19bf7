// edge-twin-allocator/src/core/TwinNode.ts

import { TwinKind, TwinNodeView, TwinPropertiesByKind } from '../types';
import { round } from '../utils/random';

/**
 * Mirror of one physical entity. AoI is measured at the moment a refresh
 * arrives, against the previous refresh.
 */
export class TwinNode<K extends TwinKind> {
    private props: TwinPropertiesByKind[K];
    private lastSyncTime: number | null = null;
    private syncs = 0;
    private age = 0;

    constructor(
        public readonly kind: K,
        public readonly id: string,
        properties: TwinPropertiesByKind[K]
    ) {
        this.props = { ...properties };
    }

    public update(properties: TwinPropertiesByKind[K], now: number): void {
        this.age = this.lastSyncTime === null ? 0 : now - this.lastSyncTime;
        this.props = { ...properties };
        this.lastSyncTime = now;
        this.syncs++;
    }

    public get properties(): Readonly<TwinPropertiesByKind[K]> {
        return this.props;
    }

    public get aoi(): number {
        return this.age;
    }

    public toView(): TwinNodeView<K> {
        return {
            kind: this.kind,
            id: this.id,
            properties: { ...this.props },
            lastSync: round(this.lastSyncTime ?? 0, 3),
            aoi: round(this.age, 3),
            syncCount: this.syncs
        };
    }
}
