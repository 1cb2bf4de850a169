import { consola } from "consola";
import {
    describeError,
    isValidationError,
    StateLockedError,
} from "../entities/errors.js";

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_VALIDATION = 2;
export const EXIT_LOCKED = 3;

export function exitCodeOf(error: unknown): number {
    if (isValidationError(error)) {
        return EXIT_VALIDATION;
    }
    if (error instanceof StateLockedError) {
        return EXIT_LOCKED;
    }
    return EXIT_FAILURE;
}

export async function runWithExitCode(work: () => Promise<void>): Promise<void> {
    try {
        await work();
    } catch (error) {
        consola.error(describeError(error));
        process.exitCode = exitCodeOf(error);
    }
}

export function parseAddressList(value: string | undefined): string[] {
    return (value ?? "")
        .split(",")
        .map((address) => address.trim())
        .filter((address) => address.length > 0);
}
