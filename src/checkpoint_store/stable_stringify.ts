// src/checkpoint_store/stable_stringify.ts
//
// JSON with recursively sorted object keys, so that rewriting an unchanged
// checkpoint produces an identical file and diffs stay readable.

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function render(value: unknown, indent: number, depth: number): string {
    if (value === null) return 'null';

    switch (typeof value) {
        case 'number':
            if (!Number.isFinite(value)) throw new Error('UNSUPPORTED_JSON_NUMBER');
            return JSON.stringify(value);
        case 'boolean':
        case 'string':
            return JSON.stringify(value);
    }

    const open = indent > 0 ? '\n' + ' '.repeat(indent * (depth + 1)) : '';
    const close = indent > 0 ? '\n' + ' '.repeat(indent * depth) : '';

    if (Array.isArray(value)) {
        if (value.length === 0) return '[]';
        return '[' + value.map((v) => open + render(v, indent, depth + 1)).join(',') + close + ']';
    }

    if (isPlainObject(value)) {
        const keys = Object.keys(value).sort(); // UTF-16 lex order like JS sort()
        if (keys.length === 0) return '{}';
        const sep = indent > 0 ? ': ' : ':';
        return (
            '{' +
            keys.map((k) => open + JSON.stringify(k) + sep + render(value[k], indent, depth + 1)).join(',') +
            close +
            '}'
        );
    }

    // undefined, function, symbol, bigint
    throw new Error('UNSUPPORTED_JSON_TYPE');
}

export function stableStringify(value: unknown, indent = 0): string {
    return render(value, indent, 0);
}
