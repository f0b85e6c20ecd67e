// Spoken forms used by the number, date and time readers.

export type Digit = '0' | '1' | '2' | '3' | '4' | '5' | '6' | '7' | '8' | '9';

export const DIGIT_WORDS: Readonly<Record<Digit | '10', string>> = Object.freeze({
    '0': 'không',
    '1': 'một',
    '2': 'hai',
    '3': 'ba',
    '4': 'bốn',
    '5': 'năm',
    '6': 'sáu',
    '7': 'bảy',
    '8': 'tám',
    '9': 'chín',
    '10': 'mười',
});

// Ones digit read right after a non-zero tens value: 21 -> "hai mươi mốt"
export const TENS_PLACE_WORDS: Readonly<Partial<Record<Digit, string>>> = Object.freeze({
    '1': 'mốt',
    '4': 'tư',
    '5': 'lăm',
});

// Indexed by base-1000 group position
export const SCALE_UNITS: readonly string[] = Object.freeze([
    '', 'nghìn', 'triệu', 'tỷ', 'nghìn tỷ', 'triệu tỷ', 'tỷ tỷ',
]);

export const MONTH_WORDS: Readonly<Record<string, string>> = Object.freeze({
    '01': 'một', '1': 'một',
    '02': 'hai', '2': 'hai',
    '03': 'ba', '3': 'ba',
    '04': 'tư', '4': 'tư',
    '05': 'năm', '5': 'năm',
    '06': 'sáu', '6': 'sáu',
    '07': 'bảy', '7': 'bảy',
    '08': 'tám', '8': 'tám',
    '09': 'chín', '9': 'chín',
    '10': 'mười',
    '11': 'mười một',
    '12': 'mười hai',
});

export const HUNDRED = 'trăm';
export const TEN = 'mươi';
export const EMPTY_TENS = 'lẻ';
export const DECIMAL_POINT = 'phẩy';

export function isDigit(char: string): char is Digit {
    return char.length === 1 && char >= '0' && char <= '9';
}
