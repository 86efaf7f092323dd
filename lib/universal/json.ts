type Dict = Record<string, unknown>;

const isDict = (v: unknown): v is Dict =>
    typeof v === "object" && v !== null && !Array.isArray(v);

// Code-point order on own keys; arrays keep their order.
const byKey = ([a]: [string, unknown], [b]: [string, unknown]) =>
    a < b ? -1 : a > b ? 1 : 0;

/**
 * `JSON.stringify` replacer that emits every object with its keys sorted.
 * The replacer runs again on the rebuilt object's children, so nested
 * objects are sorted as well.
 */
export const sortedKeysReplacer = () =>
    function replacer(this: unknown, _key: string, value: unknown) {
        if (!isDict(value)) return value;
        const sorted: Dict = {};
        for (const [k, v] of Object.entries(value).sort(byKey)) sorted[k] = v;
        return sorted;
    };

/** Stable JSON text: sorted keys, `indent` spaces, optional trailing newline. */
export function stringifySorted(
    value: unknown,
    opts: { indent?: number; trailingNewline?: boolean } = {},
): string {
    const text = JSON.stringify(value, sortedKeysReplacer(), opts.indent ?? 1);
    return opts.trailingNewline === false ? text : `${text}\n`;
}
