import superjson from "superjson";
import { SessionStoreError } from "../errors";

/**
 * Session value map. Keys are arbitrary unless the serializer says otherwise.
 */
export type SessionValues = Map<unknown, unknown>;

/**
 * Converts session values to and from the payload stored in the backend.
 *
 * `deserialize` merges decoded entries into `target`; existing entries not
 * present in the payload are kept.
 */
export interface SessionSerializer {
    serialize(values: SessionValues): string;
    deserialize(payload: string, target: SessionValues): void;
}

/**
 * Tagged JSON via superjson. Keeps non-string keys and rich values
 * (`Date`, `Map`, `Set`, `BigInt`, `undefined`) intact.
 */
export class StructuredSerializer implements SessionSerializer {
    serialize(values: SessionValues): string {
        try {
            return superjson.stringify(values);
        } catch (error) {
            throw serializationError("Failed to serialize session values.", error);
        }
    }

    deserialize(payload: string, target: SessionValues): void {
        let decoded: unknown;
        try {
            decoded = superjson.parse(payload);
        } catch (error) {
            throw serializationError("Failed to deserialize session payload.", error);
        }

        if (!(decoded instanceof Map)) {
            throw serializationError("Session payload does not hold a value map.");
        }

        for (const [key, value] of decoded) {
            target.set(key, value);
        }
    }
}

/**
 * Plain JSON object encoding. Human-readable, but every key must be a string.
 */
export class JsonSerializer implements SessionSerializer {
    serialize(values: SessionValues): string {
        const entries: [string, unknown][] = [];
        for (const [key, value] of values) {
            if (typeof key !== "string") {
                throw serializationError(
                    `non-string key value, cannot serialize session to JSON: ${String(key)}`
                );
            }
            entries.push([key, value]);
        }
        const out = Object.fromEntries(entries);

        try {
            return JSON.stringify(out);
        } catch (error) {
            throw serializationError("Failed to serialize session values to JSON.", error);
        }
    }

    deserialize(payload: string, target: SessionValues): void {
        let decoded: unknown;
        try {
            decoded = JSON.parse(payload);
        } catch (error) {
            throw serializationError("Failed to deserialize session JSON.", error);
        }

        if (typeof decoded !== "object" || decoded === null || Array.isArray(decoded)) {
            throw serializationError("Session JSON payload is not an object.");
        }

        for (const [key, value] of Object.entries(decoded)) {
            target.set(key, value);
        }
    }
}

function serializationError(message: string, cause?: unknown): SessionStoreError {
    return new SessionStoreError("SERIALIZATION_FAILED", message, cause);
}
