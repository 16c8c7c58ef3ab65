/** Resolves with the first SIGINT or SIGTERM the process receives. */
export function waitForSignal(): Promise<NodeJS.Signals> {
    return new Promise((resolve) => {
        process.once("SIGINT", () => resolve("SIGINT"));
        process.once("SIGTERM", () => resolve("SIGTERM"));
    });
}
