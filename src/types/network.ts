// edge-twin-allocator/src/types/network.ts

import { AllocationSummary } from './optimizer';
import { SyncStats, TwinSnapshot } from './twin';

export interface CycleReport {
    step: number;
    vehicles: number;
    tasks: number;
    fitness: number;
    latencyMs: number;
    energyMj: number;
    loadImbalance: number;
    served: number;
    avgAoi: number;
    maxAoi: number;
    backendSynced: number;
    allocation: AllocationSummary;
    durationMs: number;
}

export interface CycleSummary {
    cycles: number;
    avgFitness: number;
    avgLatencyMs: number;
    avgEnergyMj: number;
    totalSyncs: number;
    lastAllocation: AllocationSummary | null;
}

export interface CycleReportMessage {
    type: 'cycle_report';
    report: CycleReport;
    timestamp: string;
}

export interface TwinSnapshotMessage {
    type: 'twin_snapshot';
    snapshot: TwinSnapshot;
    stats: SyncStats;
    timestamp: string;
}

export interface StatusRequestMessage {
    type: 'status_request';
    timestamp?: string;
}

export interface FeedErrorMessage {
    type: 'error';
    reason: string;
    timestamp: string;
}

export type FeedMessage =
    | CycleReportMessage
    | TwinSnapshotMessage
    | StatusRequestMessage
    | FeedErrorMessage;
