// src/shell_vars.ts
//
// KEY=value lines that the driver script `eval`s. Values are quoted so that
// eval never expands or splits them.

const SAFE_WORD = /^[A-Za-z0-9_@%+=:,./-]+$/;
const SHELL_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

export type ShellValue = string | number | boolean;

export function shellQuote(value: string): string {
    if (value === '') return "''";
    if (SAFE_WORD.test(value)) return value;
    return "'" + value.replace(/'/g, `'"'"'`) + "'";
}

function renderValue(value: ShellValue): string {
    if (typeof value === 'boolean') return value ? 'true' : 'false';
    if (typeof value === 'number') return String(value);
    return shellQuote(value);
}

export function shellAssign(name: string, value: ShellValue): string {
    if (!SHELL_NAME.test(name)) throw new Error(`Invalid shell variable name: ${name}`);
    return `${name}=${renderValue(value)}`;
}

/** `NAME=( 'a' 'b c' )` for bash arrays; `NAME=()` when empty */
export function shellArrayAssign(name: string, values: readonly string[]): string {
    if (!SHELL_NAME.test(name)) throw new Error(`Invalid shell variable name: ${name}`);
    return `${name}=(${values.map(shellQuote).join(' ')})`;
}

/**
 * Ordered assignments. Later writes to the same key keep the first position,
 * so output order is stable for callers that diff it.
 */
export class ShellVars {
    private readonly entries = new Map<string, string>();

    set(name: string, value: ShellValue): this {
        this.entries.set(name, shellAssign(name, value));
        return this;
    }

    setArray(name: string, values: readonly string[]): this {
        this.entries.set(name, shellArrayAssign(name, values));
        return this;
    }

    lines(): string[] {
        return [...this.entries.values()];
    }

    render(): string {
        const lines = this.lines();
        return lines.length > 0 ? lines.join('\n') + '\n' : '';
    }
}
