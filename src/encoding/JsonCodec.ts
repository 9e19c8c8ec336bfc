/**
 * JsonCodec — Header/Claims Maps ⇄ JSON Text
 *
 * Serialization walks the map in insertion order and writes each member
 * itself, so a claim named `"10"` stays where it was inserted instead of
 * being hoisted the way integer-like keys are on plain objects.
 *
 * Decoding accepts only a top-level JSON object and keeps its members in
 * the order the text lists them.
 *
 * @module
 */
import { z } from 'zod';
import { JwtError } from '../errors/JwtError.js';

// ============================================================================
// Types
// ============================================================================

/** Any value JSON can carry. */
export type JsonValue =
    | string
    | number
    | boolean
    | null
    | readonly JsonValue[]
    | { readonly [key: string]: JsonValue };

/** A JSON object. */
export type JsonObject = { readonly [key: string]: JsonValue };

const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
    z.union([
        z.string(),
        z.number(),
        z.boolean(),
        z.null(),
        z.array(JsonValueSchema),
        z.record(z.string(), JsonValueSchema),
    ]),
);

const JsonObjectSchema = z.record(z.string(), JsonValueSchema);

// ============================================================================
// Encode
// ============================================================================

/**
 * Serialize a map (or plain record) to a JSON object, members in order.
 *
 * @throws {JwtError} `SERIALIZATION_FAILURE` when a member is not representable
 */
export function jsonEncode(data: ReadonlyMap<string, unknown> | Readonly<Record<string, unknown>>): string {
    const entries = data instanceof Map ? [...data.entries()] : Object.entries(data);
    const members: string[] = [];

    for (const [name, value] of entries) {
        members.push(`${JSON.stringify(name)}:${stringifyMember(name, value)}`);
    }

    return `{${members.join(',')}}`;
}

function stringifyMember(name: string, value: unknown): string {
    let json: string | undefined;
    try {
        json = JSON.stringify(value);
    } catch (err) {
        // bigint and cyclic structures throw a TypeError
        const detail = err instanceof Error ? err.message : String(err);
        throw new JwtError('SERIALIZATION_FAILURE', `Unable to encode "${name}": ${detail}`, { cause: err });
    }
    if (json === undefined) {
        throw new JwtError('SERIALIZATION_FAILURE', `Unable to encode "${name}": value has no JSON representation`);
    }
    return json;
}

// ============================================================================
// Decode
// ============================================================================

/**
 * Parse JSON text whose top-level value must be an object.
 *
 * @returns The object's members in document order
 * @throws {JwtError} `SERIALIZATION_FAILURE` on malformed JSON or a non-object
 */
export function jsonDecode(text: string): Map<string, JsonValue> {
    let parsed: unknown;
    try {
        parsed = JSON.parse(text);
    } catch (err) {
        const detail = err instanceof Error ? err.message : String(err);
        throw new JwtError('SERIALIZATION_FAILURE', `Unable to decode JSON: ${detail}`, { cause: err });
    }

    const result = JsonObjectSchema.safeParse(parsed);
    if (!result.success) {
        throw new JwtError('SERIALIZATION_FAILURE', 'Decoded JSON is not an object', { cause: result.error });
    }

    const members = new Map<string, JsonValue>();
    for (const name of memberNames(text)) {
        const value = Object.prototype.hasOwnProperty.call(result.data, name) ? result.data[name] : undefined;
        if (value !== undefined && !members.has(name)) members.set(name, value);
    }
    return members;
}

// ── Member Order ─────────────────────────────────────────

/**
 * Top-level member names of an already-validated JSON object, in the
 * order they appear in the text. Object property order would move
 * integer-like names to the front.
 * @internal
 */
function memberNames(text: string): string[] {
    const names: string[] = [];
    let depth = 0;
    let expectName = false;
    let index = 0;

    while (index < text.length) {
        const char = text[index];
        if (char === '"') {
            const end = stringEnd(text, index);
            if (depth === 1 && expectName) {
                names.push(parseName(text.slice(index, end)));
                expectName = false;
            }
            index = end;
            continue;
        }
        if (char === '{' || char === '[') {
            depth++;
            expectName = depth === 1;
        } else if (char === '}' || char === ']') {
            depth--;
        } else if (char === ',' && depth === 1) {
            expectName = true;
        }
        index++;
    }
    return names;
}

/** Index just past the closing quote of the string starting at `start`. */
function stringEnd(text: string, start: number): number {
    let index = start + 1;
    while (index < text.length && text[index] !== '"') {
        index += text[index] === '\\' ? 2 : 1;
    }
    return index + 1;
}

function parseName(literal: string): string {
    const name: unknown = JSON.parse(literal);
    return typeof name === 'string' ? name : '';
}
