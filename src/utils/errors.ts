/**
 * Root of all prepubgraph errors.
 */
export class PrepubGraphError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = 'PrepubGraphError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * A caller passed a parameter the request layer does not support
 * (unknown response view, bad page size). Never retried.
 */
export class InvalidRequestError extends PrepubGraphError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = 'InvalidRequestError';
    }
}

/**
 * A payload did not have the shape the harvester expects:
 * a missing section, a missing key, or a field of the wrong type.
 */
export class SchemaError extends PrepubGraphError {
    constructor(
        message: string,
        public readonly key?: string,
        options?: ErrorOptions
    ) {
        super(message, options);
        this.name = 'SchemaError';
    }
}
