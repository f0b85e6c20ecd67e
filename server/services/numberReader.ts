import {
    DECIMAL_POINT,
    DIGIT_WORDS,
    Digit,
    EMPTY_TENS,
    HUNDRED,
    SCALE_UNITS,
    TEN,
    TENS_PLACE_WORDS,
    isDigit,
} from './lexicon';

// Longer digit runs are read one digit at a time
export const MAX_GROUPED_DIGITS = 18;

const DIGITS: readonly Digit[] = ['0', '1', '2', '3', '4', '5', '6', '7', '8', '9'];
const DIGIT_RUN = /^\d+$/;

export interface NumberGroup {
    value: number;
    position: number;
}

/**
 * Reads a single digit. With `inTensPosition` the digit is the ones digit
 * following a tens value and takes its irregular form where one exists.
 */
export function readDigit(digit: number, inTensPosition: boolean = false): string {
    const key = DIGITS[digit];
    if (key === undefined) {
        throw new RangeError(`Not a digit: ${digit}`);
    }
    if (inTensPosition) {
        const irregular = TENS_PLACE_WORDS[key];
        if (irregular) return irregular;
    }
    return DIGIT_WORDS[key];
}

// 10..99
function readTens(num: number): string[] {
    const tens = Math.floor(num / 10);
    const ones = num % 10;

    const words = tens === 1 ? [DIGIT_WORDS['10']] : [readDigit(tens), TEN];
    if (ones !== 0) words.push(readDigit(ones, true));
    return words;
}

export function readSmallNumber(num: number): string {
    if (!Number.isInteger(num) || num < 0 || num > 999) {
        throw new RangeError(`Expected an integer in 0..999, got ${num}`);
    }
    if (num < 10) return readDigit(num);

    const words: string[] = [];

    if (num >= 100) {
        words.push(readDigit(Math.floor(num / 100)), HUNDRED);
        num %= 100;
        if (num === 0) return words.join(' ');
        if (num < 10) {
            words.push(EMPTY_TENS, readDigit(num));
            return words.join(' ');
        }
    }

    words.push(...readTens(num));
    return words.join(' ');
}

/** Little-endian base-1000 split: 1234567n -> [567, 234, 1] */
export function splitGroups(num: bigint): NumberGroup[] {
    const groups: NumberGroup[] = [];
    let rest = num;
    let position = 0;
    do {
        groups.push({ value: Number(rest % 1000n), position });
        rest /= 1000n;
        position++;
    } while (rest > 0n);
    return groups;
}

/**
 * Reads a number group by group, most significant first. Zero groups are
 * dropped; an inner group of 10..99 voices its empty hundreds
 * ("hai nghìn không trăm hai mươi ba") while an inner group of 1..9 is read
 * bare ("một nghìn năm").
 */
export function readGroupedNumber(num: bigint): string {
    const groups = splitGroups(num);
    const top = groups.length - 1;
    const words: string[] = [];

    for (let i = top; i >= 0; i--) {
        const { value, position } = groups[i];

        if (value === 0) {
            if (top === 0) words.push(readSmallNumber(0));
            continue;
        }

        let text = readSmallNumber(value);
        if (position < top && value >= 10 && value < 100) {
            text = `${DIGIT_WORDS['0']} ${HUNDRED} ${text}`;
        }

        const unit = SCALE_UNITS[position];
        if (position > 0 && unit) text += ` ${unit}`;

        words.push(text);
    }

    return words.join(' ');
}

export function readDigits(digits: string): string {
    return Array.from(digits, (char) => (isDigit(char) ? DIGIT_WORDS[char] : char)).join(' ');
}

/**
 * Reads a run of ASCII digits. Anything else comes back untouched.
 */
export function convertNumber(numberStr: string): string {
    if (!DIGIT_RUN.test(numberStr)) return numberStr;

    const significant = numberStr.replace(/^0+/, '');
    if (!significant) return DIGIT_WORDS['0'];

    if (significant.length > MAX_GROUPED_DIGITS) {
        return readDigits(significant);
    }

    const num = BigInt(significant);
    return num < 1000n ? readSmallNumber(Number(num)) : readGroupedNumber(num);
}

export function convertDecimal(integerPart: string, decimalPart: string, separator: string = ','): string {
    if (!DIGIT_RUN.test(integerPart) || !DIGIT_RUN.test(decimalPart)) {
        return `${integerPart}${separator}${decimalPart}`;
    }
    return `${convertNumber(integerPart)} ${DECIMAL_POINT} ${readDigits(decimalPart)}`;
}
