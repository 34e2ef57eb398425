import { isJsonObject, JsonObject, JsonValue } from "../types/json";

// defineProperty keeps a literal "__proto__" key as data instead of a prototype
function setKey(target: JsonObject, key: string, value: JsonValue): void {
    Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}

function cloneJson(value: JsonValue): JsonValue {
    if (Array.isArray(value)) {
        return value.map(cloneJson);
    }
    if (isJsonObject(value)) {
        const copy: JsonObject = {};
        for (const [key, nested] of Object.entries(value)) {
            setKey(copy, key, cloneJson(nested));
        }
        return copy;
    }
    return value;
}

/**
 * Recursively merges `incoming` into a copy of `base`.
 *
 * Keys holding objects on both sides are merged; any other incoming value
 * (scalar, array, or an object replacing a non-object) replaces the stored
 * one wholesale. Neither argument is mutated, and merging the same payload
 * again yields the same result.
 */
export function deepMerge(base: JsonObject, incoming: JsonObject): JsonObject {
    const result: JsonObject = {};
    for (const [key, value] of Object.entries(base)) {
        setKey(result, key, cloneJson(value));
    }

    for (const [key, value] of Object.entries(incoming)) {
        const current = Object.prototype.hasOwnProperty.call(result, key) ? result[key] : undefined;
        if (isJsonObject(current) && isJsonObject(value)) {
            setKey(result, key, deepMerge(current, value));
        } else {
            setKey(result, key, cloneJson(value));
        }
    }

    return result;
}
