import { InvalidArgumentError } from '../errors';

/**
 * Greedy left-to-right slicing into runs of at most `maxLength` characters.
 * No word boundaries, no hyphenation. Empty input gives a single empty line.
 */
export function splitText(text: string | null | undefined, maxLength: number): string[] {
    if (!Number.isInteger(maxLength) || maxLength <= 0) {
        throw new InvalidArgumentError(`Maximum line length must be a positive integer (got ${maxLength})`);
    }

    let rest = text ?? '';
    if (rest.length === 0) return [''];

    const lines: string[] = [];
    while (rest.length > maxLength) {
        lines.push(rest.slice(0, maxLength));
        rest = rest.slice(maxLength);
    }
    lines.push(rest);
    return lines;
}
