// edge-twin-allocator/src/core/errors.ts

export class OptimizerConfigError extends Error {
    constructor(public readonly issues: string[]) {
        super(`Invalid optimizer configuration: ${issues.join('; ')}`);
        this.name = 'OptimizerConfigError';
    }
}
