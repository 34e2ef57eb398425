import { describe, it, expect } from 'vitest';
import { deepMerge } from '../../../src/utils/json-merge.util';
import { JsonObject } from '../../../src/types/json';

describe('deepMerge - JSON Merge Tests', () => {
    describe('Merging Rules', () => {
        it('should merge nested objects key by key', () => {
            const base: JsonObject = { budget: { amount: 100, currency: 'RUB' }, title: 'Old' };
            const incoming: JsonObject = { budget: { amount: 250 }, tags: ['web'] };

            expect(deepMerge(base, incoming)).toEqual({
                budget: { amount: 250, currency: 'RUB' },
                title: 'Old',
                tags: ['web']
            });
        });

        it('should replace arrays wholesale', () => {
            const result = deepMerge({ tags: ['a', 'b'] }, { tags: ['c'] });
            expect(result).toEqual({ tags: ['c'] });
        });

        it('should replace a scalar with an object and an object with a scalar', () => {
            expect(deepMerge({ contact: 'email' }, { contact: { email: 'a@example.test' } }))
                .toEqual({ contact: { email: 'a@example.test' } });
            expect(deepMerge({ contact: { email: 'a@example.test' } }, { contact: null }))
                .toEqual({ contact: null });
        });

        it('should keep a "__proto__" key as plain data', () => {
            const incoming: JsonObject = JSON.parse('{"__proto__": {"polluted": true}}');
            const result = deepMerge({}, incoming);

            expect(Object.keys(result)).toEqual(['__proto__']);
            expect(Object.getPrototypeOf(result)).toBe(Object.prototype);
            expect(Object.prototype).not.toHaveProperty('polluted');
        });
    });

    describe('Purity and Idempotence', () => {
        it('should not mutate either argument', () => {
            const base: JsonObject = { a: { b: 1 } };
            const incoming: JsonObject = { a: { c: 2 } };

            const result = deepMerge(base, incoming);

            expect(base).toEqual({ a: { b: 1 } });
            expect(incoming).toEqual({ a: { c: 2 } });
            expect(result).toEqual({ a: { b: 1, c: 2 } });
        });

        it('should yield the same result when the same payload is merged twice', () => {
            const base: JsonObject = { stage: 'new', details: { skills: ['ts'], level: 1 } };
            const payload: JsonObject = { details: { level: 2, nested: { field: 'value' } } };

            const once = deepMerge(base, payload);
            const twice = deepMerge(once, payload);

            expect(twice).toEqual(once);
        });

        it('should not share nested references with the inputs', () => {
            const payload: JsonObject = { nested: { field: 'value' } };
            const result = deepMerge({}, payload);

            const nested = result.nested;
            if (typeof nested !== 'object' || nested === null || Array.isArray(nested)) {
                throw new Error('expected an object');
            }
            nested.field = 'changed';

            expect(payload).toEqual({ nested: { field: 'value' } });
        });
    });
});
