import fc from 'fast-check';
import { describe, expect, it } from 'vitest';
import { FrozenSetError } from '../src/errors';
import { ValueSet, compare, getHashCode, singleton } from '../src/value-set';

describe('ValueSet', () => {
    describe('value semantics', () => {
        it('ignores duplicates', () => {
            const set = new ValueSet([1, 1, 2]);
            expect(set.size).toBe(2);
        });

        it('reports whether add inserted a new element', () => {
            const set = new ValueSet<number>();
            expect(set.add(4)).toBe(true);
            expect(set.add(4)).toBe(false);
            expect(set.size).toBe(1);
        });

        it('treats sets with the same members as equal regardless of order', () => {
            const a = new ValueSet([1, 2, 3]);
            const b = new ValueSet([3, 2, 1]);
            expect(a.equals(b)).toBe(true);
            expect(a.hashCode).toBe(b.hashCode);
        });

        it('distinguishes sets with different members', () => {
            expect(new ValueSet([1, 2]).equals(new ValueSet([1, 3]))).toBe(false);
            expect(new ValueSet([1, 2]).equals(new ValueSet([1]))).toBe(false);
            expect(new ValueSet([1]).equals([1])).toBe(false);
        });

        it('collapses equal nested sets', () => {
            const outer = new ValueSet([new ValueSet([1, 2]), new ValueSet([2, 1])]);
            expect(outer.size).toBe(1);
            expect(outer.has(new ValueSet([1, 2]))).toBe(true);
            expect(outer.has(new ValueSet([1]))).toBe(false);
        });

        it('iterates in insertion order of first occurrence', () => {
            expect([...new ValueSet([5, 3, 9, 3, 5])]).toEqual([5, 3, 9]);
        });

        it('keeps every element across table growth', () => {
            const set = new ValueSet<number>();
            for (let i = 0; i < 1000; i++) set.add(i);
            expect(set.size).toBe(1000);
            for (let i = 0; i < 1000; i++) expect(set.has(i)).toBe(true);
            expect(set.has(1000)).toBe(false);
        });

        it('matches native Set membership for arbitrary integers', () => {
            fc.assert(
                fc.property(fc.array(fc.integer({ min: -500, max: 500 }), { maxLength: 60 }), (values) => {
                    const set = new ValueSet(values);
                    const native = new Set(values);
                    expect(set.size).toBe(native.size);
                    for (const v of native) expect(set.has(v)).toBe(true);
                    expect(set.equals(new ValueSet([...values].reverse()))).toBe(true);
                })
            );
        });
    });

    describe('freeze-on-hash', () => {
        it('freezes when the hash code is read', () => {
            const set = new ValueSet<number>([1]);
            expect(set.isFrozen).toBe(false);
            void set.hashCode;
            expect(set.isFrozen).toBe(true);
            expect(() => set.add(2)).toThrow(FrozenSetError);
        });

        it('freezes members that are added to another set', () => {
            const inner = new ValueSet([1, 2]);
            new ValueSet([inner]);
            expect(inner.isFrozen).toBe(true);
        });

        it('clones into a modifiable copy', () => {
            const set = new ValueSet<number>([1, 2]);
            void set.hashCode;
            const copy = set.clone();
            expect(copy.isFrozen).toBe(false);
            expect(copy.add(3)).toBe(true);
            expect(set.size).toBe(2);
            expect([...copy]).toEqual([1, 2, 3]);
        });
    });

    describe('isProperSubsetOf', () => {
        it('holds for a strictly smaller contained set', () => {
            expect(new ValueSet<number>([1]).isProperSubsetOf(new ValueSet([1, 2]))).toBe(true);
        });

        it('does not hold for an equal set', () => {
            expect(new ValueSet([1, 2]).isProperSubsetOf(new ValueSet([2, 1]))).toBe(false);
        });

        it('does not hold for a disjoint set', () => {
            expect(new ValueSet<number>([3]).isProperSubsetOf(new ValueSet([1, 2]))).toBe(false);
        });
    });

    describe('ordering and text', () => {
        it('prints members in ascending order', () => {
            expect(new ValueSet([3, 1, 2]).toString()).toBe('{1, 2, 3}');
            expect(new ValueSet<number>().toString()).toBe('{}');
        });

        it('orders numbers before strings before sets', () => {
            expect(compare(1, 2)).toBeLessThan(0);
            expect(compare(2, 'a')).toBeLessThan(0);
            expect(compare('a', new ValueSet([1]))).toBeLessThan(0);
            expect(ValueSet.compare('b', 'a')).toBeGreaterThan(0);
        });

        it('compares equal sets as equal', () => {
            const a = new ValueSet([1, 2, 3]);
            expect(compare(a, new ValueSet([3, 1, 2]))).toBe(0);
            expect(a.compare(a.clone())).toBe(0);
        });

        it('orders colliding structures by their text', () => {
            const colliding = (text: string) => ({
                hashCode: 7,
                equals: (other: unknown) => other instanceof Object && String(other) === text,
                toString: () => text,
            });
            expect(compare(colliding('a'), colliding('b'))).toBeLessThan(0);
            expect(compare(colliding('b'), colliding('a'))).toBeGreaterThan(0);
            expect(compare(colliding('a'), colliding('a'))).toBe(0);
        });

        it('hashes equal strings alike', () => {
            expect(getHashCode('hel' + 'lo')).toBe(getHashCode('hello'));
        });

        it('builds singletons', () => {
            const one = singleton(7);
            expect(one.size).toBe(1);
            expect(one.has(7)).toBe(true);
        });
    });
});
