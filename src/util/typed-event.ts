import defaultLogger, { type Logger } from "./logger";

type Listener<T> = (e: T) => void;

/**
 * Minimal typed emitter. A throwing listener is logged and does not stop the
 * remaining listeners from running.
 */
export class TypedEvent<TEvents extends object> {
    private readonly listeners: { [K in keyof TEvents]?: Set<Listener<TEvents[K]>> } = {};

    constructor(private readonly logger: Logger = defaultLogger) { }

    on<K extends keyof TEvents>(event: K, fn: Listener<TEvents[K]>): () => void {
        let set = this.listeners[event];
        if (!set) {
            set = new Set();
            this.listeners[event] = set;
        }
        set.add(fn);
        return () => this.off(event, fn);
    }

    once<K extends keyof TEvents>(event: K, fn: Listener<TEvents[K]>): () => void {
        const off = this.on(event, (e) => {
            off();
            fn(e);
        });
        return off;
    }

    off<K extends keyof TEvents>(event: K, fn: Listener<TEvents[K]>): void {
        this.listeners[event]?.delete(fn);
    }

    emit<K extends keyof TEvents>(event: K, payload: TEvents[K]): void {
        const set = this.listeners[event];
        if (!set) {
            return;
        }

        for (const fn of Array.from(set)) {
            try {
                fn(payload);
            } catch (err) {
                this.logger.error({ err, event: String(event) }, "Event listener threw");
            }
        }
    }
}
