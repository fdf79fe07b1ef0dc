/**
 * Converts whatever a backend handed back into plain JSON.
 *
 * Values JSON cannot carry are replaced by a string form and reported as
 * degradations; the call itself still succeeds.
 */

import { inspect } from 'node:util';
import _ from 'lodash';

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
    [key: string]: JsonValue
}

export interface Degradation {
    /** Location in the result, e.g. `$.content[0].data` */
    path: string
    /** What was found there: `bigint`, `function`, `circular`, `Map`, ... */
    type: string
}

export interface NormalizedValue {
    value:        JsonValue
    degradations: Degradation[]
}

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
    return _.isObject(value) && !Array.isArray(value);
}

function childPath(path: string, key: string | number): string {
    if(_.isNumber(key)) {
        return `${path}[${key}]`;
    }
    return /^[A-Za-z_$][\w$]*$/.test(key) ? `${path}.${key}` : `${path}[${JSON.stringify(key)}]`;
}

function describeObject(value: object): string {
    const prototype: unknown = Object.getPrototypeOf(value);
    if(_.isObject(prototype) && 'constructor' in prototype && _.isFunction(prototype.constructor) && prototype.constructor.name) {
        return prototype.constructor.name;
    }
    return 'object';
}

export function normalizeValue(input: unknown): NormalizedValue {
    const degradations: Degradation[] = [];
    const ancestors = new Set<object>();

    const degrade = (path: string, type: string, replacement: string): string => {
        degradations.push({ path, type });
        return replacement;
    };

    const visit = (value: unknown, path: string): JsonValue => {
        if(value === null || value === undefined) {
            return null;
        }
        if(_.isString(value) || _.isBoolean(value)) {
            return value;
        }
        if(_.isNumber(value)) {
            return Number.isFinite(value) ? value : degrade(path, 'non-finite number', String(value));
        }
        if(typeof value === 'bigint') {
            return degrade(path, 'bigint', value.toString());
        }
        if(typeof value === 'symbol') {
            return degrade(path, 'symbol', value.toString());
        }
        if(_.isFunction(value)) {
            return degrade(path, 'function', `[Function: ${value.name || 'anonymous'}]`);
        }
        if(!_.isObject(value)) {
            return degrade(path, typeof value, String(value));
        }

        if(ancestors.has(value)) {
            return degrade(path, 'circular', '[Circular]');
        }

        if(Array.isArray(value)) {
            ancestors.add(value);
            const items = _.map(value, (item: unknown, index) => visit(item, childPath(path, index)));
            ancestors.delete(value);
            return items;
        }

        if(_.isDate(value)) {
            return Number.isNaN(value.getTime()) ? null : value.toISOString();
        }

        if(!_.isPlainObject(value)) {
            return degrade(path, describeObject(value), inspect(value, { depth: 2, breakLength: Infinity }));
        }

        ancestors.add(value);
        const result: JsonObject = {};
        for(const [key, child] of Object.entries(value)) {
            // JSON drops undefined members the same way
            if(child !== undefined) {
                result[key] = visit(child, childPath(path, key));
            }
        }
        ancestors.delete(value);
        return result;
    };

    return { value: visit(input, '$'), degradations };
}
