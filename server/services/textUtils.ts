type CharClass = 'alpha' | 'digit' | null;

const LETTER = /\p{L}/u;

function classify(char: string): CharClass {
    if (char >= '0' && char <= '9') return 'digit';
    if (LETTER.test(char)) return 'alpha';
    return null;
}

export function collapseWhitespace(text: string): string {
    return text.replace(/\s+/g, ' ').trim();
}

/**
 * Puts a space wherever a letter run meets a digit run.
 * "22T583XYZ" -> "22 T 583 XYZ"
 */
export function separateAlphanumeric(text: string): string {
    const result: string[] = [];
    let current: CharClass = null;

    for (const char of text) {
        const next = classify(char);
        if (current !== null && next !== null && next !== current) {
            result.push(' ');
        }
        result.push(char);
        current = next;
    }

    return result.join('');
}

// Hyphens are left to the recognition pipeline, which still needs them for dates
export function splitIdentifierMarks(text: string): string {
    return text.replace(/_/g, ' ');
}

export function spaceTrailingDigits(text: string): string {
    return text.replace(/(\d+)([^\d\s])/g, '$1 $2');
}
