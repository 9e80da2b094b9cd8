/**
 * Error types raised by the set engine and the clique generator.
 */

/** Thrown when a frozen ValueSet is modified. */
export class FrozenSetError extends Error {
    constructor(operation: string) {
        super(
            `InvalidOperation: Cannot ${operation} a frozen ValueSet.\n` +
            `This set has been hashed or used in a collection (Value Semantics).\n` +
            `Use .clone() to create a modifiable copy.`
        );
        this.name = 'FrozenSetError';
    }
}

/** Thrown when the generator is asked for a count outside 1, 2, 3, ... */
export class InvalidCliqueCountError extends RangeError {
    readonly value: number;

    constructor(value: number) {
        super(`Clique count must be a positive integer, got ${String(value)}`);
        this.name = 'InvalidCliqueCountError';
        this.value = value;
    }
}

/**
 * Thrown when a configuration accepted by the generator breaks the
 * membership invariant. Indicates a defect in generation, not bad input.
 */
export class CliqueInvariantError extends Error {
    readonly configuration: string;

    constructor(configuration: string, reason: string) {
        super(`Invariant violated for ${configuration}: ${reason}`);
        this.name = 'CliqueInvariantError';
        this.configuration = configuration;
    }
}
