/** Thrown when a process is constructed with parameters outside its domain. */
export class InvalidParameterError extends Error {
    readonly parameter: string;
    readonly value: unknown;

    constructor(parameter: string, value: unknown, message: string) {
        super(`Invalid ${parameter}: ${message}`);
        this.name = "InvalidParameterError";
        this.parameter = parameter;
        this.value = value;
    }
}

export function requireNonNegativeInt(parameter: string, value: number): number {
    requireInt(parameter, value);
    if(value < 0) throw new InvalidParameterError(parameter, value, "must not be negative");
    return value;
}

export function requireInt(parameter: string, value: number): number {
    if(!Number.isInteger(value)) throw new InvalidParameterError(parameter, value, "must be an integer");
    if(!Number.isSafeInteger(value)) throw new InvalidParameterError(parameter, value, "must be within the safe integer range");
    return value;
}

export function requirePositive(parameter: string, value: number): number {
    if(!Number.isFinite(value) || value <= 0) throw new InvalidParameterError(parameter, value, "must be a finite number greater than zero");
    return value;
}

export function requireInRange(parameter: string, value: number, min: number, max: number): number {
    requireInt(parameter, value);
    if(value < min || value > max) throw new InvalidParameterError(parameter, value, `must be between ${min} and ${max}`);
    return value;
}
