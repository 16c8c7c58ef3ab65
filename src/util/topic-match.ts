import { InvalidTopicError } from "../errors";

export function isExactFilter(filter: string): boolean {
    return filter.indexOf("+") === -1 && filter.indexOf("#") === -1;
}

/**
 * MQTT topic filter matching for + and #.
 * - + matches exactly one level
 * - # matches zero or more remaining levels (must be last)
 * - topics starting with $ are not matched by a leading + or #
 */
export function matchTopic(filter: string, topic: string): boolean {
    if (filter === topic) {
        return true;
    }

    const f = filter.split("/");
    const t = topic.split("/");

    if (topic.startsWith("$") && (f[0] === "+" || f[0] === "#")) {
        return false;
    }

    for (let i = 0; i < f.length; i++) {
        const fp = f[i]!;

        if (fp === "#") {
            return i === f.length - 1;
        }

        if (i >= t.length) {
            return false;
        }

        if (fp === "+") {
            continue;
        }

        if (fp !== t[i]) {
            return false;
        }
    }

    return f.length === t.length;
}

export function validateTopicFilter(filter: string): void {
    if (filter.length === 0) {
        throw new InvalidTopicError("Topic filter must not be empty", filter);
    }
    const levels = filter.split("/");
    levels.forEach((level, i) => {
        if (level.includes("#") && (level !== "#" || i !== levels.length - 1)) {
            throw new InvalidTopicError(`"#" must be the last level of a filter: ${filter}`, filter);
        }
        if (level.includes("+") && level !== "+") {
            throw new InvalidTopicError(`"+" must occupy a whole level: ${filter}`, filter);
        }
    });
}

export function validateTopicName(topic: string): void {
    if (topic.length === 0) {
        throw new InvalidTopicError("Topic name must not be empty", topic);
    }
    if (!isExactFilter(topic)) {
        throw new InvalidTopicError(`Wildcards are not allowed in a topic name: ${topic}`, topic);
    }
}
