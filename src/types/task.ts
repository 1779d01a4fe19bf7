// edge-twin-allocator/src/types/task.ts

export const EXECUTION_LOCATIONS = [
    'local_cache',
    'primary_node',
    'neighbor_aggregator',
    'cloud'
] as const;

export type ExecutionLocation = typeof EXECUTION_LOCATIONS[number];

export const LOCATION_LABELS: Record<ExecutionLocation, string> = {
    local_cache: 'Vehicle Cache',
    primary_node: 'Primary Edge Node',
    neighbor_aggregator: 'Neighbor Node/Aggregator',
    cloud: 'Cloud'
};

export const TIME_BOUNDED_LOCATIONS: readonly ExecutionLocation[] = [
    'primary_node',
    'neighbor_aggregator',
    'cloud'
];

export const RELAXED_LOCATIONS: readonly ExecutionLocation[] = ['local_cache', 'cloud'];

export interface OffloadTask {
    taskId: string;
    vehicleId: string;
    nearestNodeId: string | null;
    dataSizeKb: number;
    outputSizeKb: number;
    computeCycles: number;
    timeBounded: boolean;
    allocation: ExecutionLocation | null;
    latencyMs: number;
    energyMj: number;
}

// Attributes the cost model and optimizer read from a task.
export type TaskProfile = Pick<
    OffloadTask,
    'dataSizeKb' | 'outputSizeKb' | 'computeCycles' | 'timeBounded'
> & { nearestNodeId?: string | null };

export interface TaskView {
    taskId: string;
    vehicleId: string;
    nearestNodeId: string | null;
    dataSizeKb: number;
    outputSizeKb: number;
    computeCycles: string;
    timeBounded: boolean;
    allocatedTo: string;
    latencyMs: number;
    energyMj: number;
}

export function permittedLocations(task: Pick<TaskProfile, 'timeBounded'>): readonly ExecutionLocation[] {
    return task.timeBounded ? TIME_BOUNDED_LOCATIONS : RELAXED_LOCATIONS;
}

export function isPermittedLocation(
    task: Pick<TaskProfile, 'timeBounded'>,
    location: ExecutionLocation
): boolean {
    return permittedLocations(task).includes(location);
}
