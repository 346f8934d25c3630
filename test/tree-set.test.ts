import { HashSet, Structural, TreeSet, Tuple, Value, sortedValues } from '../src';

/** Unequal instances share a hash code and a rendering. */
class Twin implements Structural {
    constructor(readonly id: number) {}

    get hashCode(): number { return 7; }

    equals(other: unknown): boolean {
        return other instanceof Twin && other.id === this.id;
    }

    toString(): string { return 'twin'; }
}

describe('TreeSet', () => {
    test('starts empty', () => {
        const s = TreeSet.new<number>();
        expect(s.size).toBe(0);
        expect(s.isEmpty()).toBe(true);
        expect(s.first()).toBeUndefined();
        expect(s.last()).toBeUndefined();
        expect(s.toString()).toBe('TreeSet\n');
    });

    test('keeps elements in ascending order', () => {
        const s = TreeSet.of<number>(3, 1, 2, 3);
        expect(s.size).toBe(3);
        expect(s.values()).toEqual([1, 2, 3]);
        expect([...s]).toEqual([1, 2, 3]);
        expect(s.first()).toBe(1);
        expect(s.last()).toBe(3);
        expect(s.toString()).toBe('TreeSet\n1, 2, 3');
    });

    test('add, remove and contains', () => {
        const s = TreeSet.new<number>();
        s.add(1, 2, 3);
        s.remove(2, 7);

        expect(s.values()).toEqual([1, 3]);
        expect(s.contains(1, 3)).toBe(true);
        expect(s.contains(1, 2)).toBe(false);
        expect(s.contains()).toBe(true);
    });

    test('values returns an independent copy', () => {
        const s = TreeSet.of<string>('a', 'b');
        s.values().push('c');
        expect(s.values()).toEqual(['a', 'b']);
    });

    test('clear keeps the comparator', () => {
        const s = new TreeSet<number>([1, 2, 3], (a, b) => b - a);
        s.clear();
        expect(s.size).toBe(0);
        s.add(1, 5, 3);
        expect(s.values()).toEqual([5, 3, 1]);
    });

    test('orders mixed kinds with the default comparator', () => {
        const s = TreeSet.of<Value>('b', 2, true, 'a', 1, false);
        expect(s.values()).toEqual([1, 2, 'a', 'b', false, true]);
    });

    test('orders and deduplicates tuples', () => {
        const s = TreeSet.of(new Tuple(2, 1), new Tuple(1, 2), new Tuple(1, 2), new Tuple(0));
        expect(s.size).toBe(3);
        expect(s.toString()).toBe('TreeSet\n(0), (1, 2), (2, 1)');
    });

    test('set algebra keeps the receiver comparator', () => {
        const desc = (a: number, b: number) => b - a;
        const a = new TreeSet<number>([1, 2, 3], desc);
        const b = TreeSet.of<number>(2, 3, 4);

        expect(a.union(b).values()).toEqual([4, 3, 2, 1]);
        expect(a.intersection(b).values()).toEqual([3, 2]);
        expect(a.subtract(b).values()).toEqual([1]);
        expect(b.subtract(a).values()).toEqual([4]);
        expect(a.intersect(b)).toBe(true);
        expect(a.union(b).comparator).toBe(desc);
    });

    test('results do not mutate the inputs', () => {
        const a = TreeSet.of<number>(1, 2);
        const b = TreeSet.of<number>(2, 3);
        a.union(b).add(10);
        a.intersection(b);
        a.subtract(b);

        expect(a.values()).toEqual([1, 2]);
        expect(b.values()).toEqual([2, 3]);
    });

    describe('elements the comparator cannot order', () => {
        test('are kept apart when they are not equal', () => {
            const s = TreeSet.of(new Twin(1), new Twin(2), new Twin(1));
            expect(s.size).toBe(2);
            expect(s.values().map(t => t.id)).toEqual([1, 2]);
            expect(s.contains(new Twin(2))).toBe(true);
            expect(s.contains(new Twin(3))).toBe(false);
            expect(s.toString()).toBe('TreeSet\ntwin, twin');
        });

        test('are removed one at a time', () => {
            const s = TreeSet.of(new Twin(1), new Twin(2), new Twin(3));
            s.remove(new Twin(1), new Twin(9));
            expect(s.size).toBe(2);
            expect(s.first()?.id).toBe(2);
            expect(s.last()?.id).toBe(3);

            s.remove(new Twin(2), new Twin(3));
            expect(s.isEmpty()).toBe(true);
            expect(s.first()).toBeUndefined();
        });

        test('combine with a HashSet by value', () => {
            const h = HashSet.of(new Twin(1), new Twin(2));
            const t = TreeSet.of(new Twin(2), new Twin(3));

            expect(h.intersection(t).values().map(x => x.id)).toEqual([2]);
            expect(t.intersection(h).values().map(x => x.id)).toEqual([2]);
            expect(h.subtract(t).values().map(x => x.id)).toEqual([1]);
            expect(t.union(h).size).toBe(3);
            expect(TreeSet.of(new Twin(1)).intersect(HashSet.of(new Twin(2)))).toBe(false);
        });
    });

    test('agrees with HashSet on mixed elements', () => {
        const items: Value[] = [3, 'x', new Tuple(1), new Twin(4), new Twin(5), 3, new Twin(4)];
        const h = new HashSet<Value>(items);
        const t = new TreeSet<Value>(items);
        expect(t.size).toBe(h.size);
        expect(h.subtract(t).isEmpty()).toBe(true);
        expect(t.subtract(h).isEmpty()).toBe(true);
        expect(sortedValues(h).length).toBe(5);
    });
});
