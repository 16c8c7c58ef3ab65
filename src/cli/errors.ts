import { ZodError } from "zod";
import { logError } from "../util/logger";

/** Prints a failure the way the CLIs report it and returns the exit code. */
export function reportFailure(context: string, err: unknown): number {
    if (err instanceof ZodError) {
        logError(`${context}: invalid configuration`);
        for (const issue of err.issues) {
            logError(`  - ${issue.path.join(".")}: ${issue.message}`);
        }
    } else {
        logError(`${context}: ${err instanceof Error ? err.message : String(err)}`);
    }
    return 1;
}
