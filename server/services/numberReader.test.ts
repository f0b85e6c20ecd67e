import { describe, it, expect } from 'vitest';
import { DIGIT_WORDS, isDigit } from './lexicon';
import {
    convertDecimal,
    convertNumber,
    readDigit,
    readDigits,
    readGroupedNumber,
    readSmallNumber,
    splitGroups,
} from './numberReader';

describe('readDigit', () => {
    it('reads every digit with the plain word outside the tens position', () => {
        for (let d = 0; d <= 9; d++) {
            const key = String(d);
            expect(isDigit(key)).toBe(true);
            if (isDigit(key)) expect(readDigit(d)).toBe(DIGIT_WORDS[key]);
        }
    });

    it('uses the irregular ones forms after a tens value', () => {
        expect(readDigit(1, true)).toBe('mốt');
        expect(readDigit(4, true)).toBe('tư');
        expect(readDigit(5, true)).toBe('lăm');
        expect(readDigit(7, true)).toBe('bảy');
    });

    it('rejects non-digits', () => {
        expect(() => readDigit(10)).toThrow(RangeError);
    });
});

describe('readSmallNumber', () => {
    it('reads single digits from the digit table', () => {
        expect(readSmallNumber(0)).toBe('không');
        expect(readSmallNumber(5)).toBe('năm');
        expect(readSmallNumber(9)).toBe('chín');
    });

    it('reads the teens', () => {
        expect(readSmallNumber(10)).toBe('mười');
        expect(readSmallNumber(11)).toBe('mười mốt');
        expect(readSmallNumber(14)).toBe('mười tư');
        expect(readSmallNumber(15)).toBe('mười lăm');
        expect(readSmallNumber(19)).toBe('mười chín');
    });

    it('reads tens with mươi', () => {
        expect(readSmallNumber(20)).toBe('hai mươi');
        expect(readSmallNumber(21)).toBe('hai mươi mốt');
        expect(readSmallNumber(24)).toBe('hai mươi tư');
        expect(readSmallNumber(25)).toBe('hai mươi lăm');
        expect(readSmallNumber(99)).toBe('chín mươi chín');
    });

    it('reads hundreds, marking an empty tens position with lẻ', () => {
        expect(readSmallNumber(100)).toBe('một trăm');
        expect(readSmallNumber(101)).toBe('một trăm lẻ một');
        expect(readSmallNumber(104)).toBe('một trăm lẻ bốn');
        expect(readSmallNumber(105)).toBe('một trăm lẻ năm');
        expect(readSmallNumber(110)).toBe('một trăm mười');
        expect(readSmallNumber(115)).toBe('một trăm mười lăm');
        expect(readSmallNumber(120)).toBe('một trăm hai mươi');
        expect(readSmallNumber(999)).toBe('chín trăm chín mươi chín');
    });

    it('rejects values outside 0..999', () => {
        expect(() => readSmallNumber(1000)).toThrow(RangeError);
        expect(() => readSmallNumber(-1)).toThrow(RangeError);
        expect(() => readSmallNumber(1.5)).toThrow(RangeError);
    });
});

describe('readGroupedNumber', () => {
    it('splits little-endian base-1000 groups', () => {
        expect(splitGroups(1234567n)).toEqual([
            { value: 567, position: 0 },
            { value: 234, position: 1 },
            { value: 1, position: 2 },
        ]);
    });

    it('drops zero groups', () => {
        expect(readGroupedNumber(1000n)).toBe('một nghìn');
        expect(readGroupedNumber(1000000n)).toBe('một triệu');
        expect(readGroupedNumber(1000000000n)).toBe('một tỷ');
        expect(readGroupedNumber(1000005n)).toBe('một triệu năm');
    });

    it('voices the empty hundreds of an inner two-digit group', () => {
        expect(readGroupedNumber(2023n)).toBe('hai nghìn không trăm hai mươi ba');
        expect(readGroupedNumber(1020000n)).toBe('một triệu không trăm hai mươi nghìn');
    });

    it('keeps the lẻ reading inside a group', () => {
        expect(readGroupedNumber(105000n)).toBe('một trăm lẻ năm nghìn');
    });
});

describe('convertNumber', () => {
    it('strips leading zeros', () => {
        expect(convertNumber('0')).toBe('không');
        expect(convertNumber('000')).toBe('không');
        expect(convertNumber('007')).toBe('bảy');
        expect(convertNumber('0000000000000000000012')).toBe('mười hai');
    });

    it('reads the grouped examples', () => {
        expect(convertNumber('1000000')).toBe('một triệu');
        expect(convertNumber('1005')).toBe('một nghìn năm');
        expect(convertNumber('2023')).toBe('hai nghìn không trăm hai mươi ba');
        expect(convertNumber('1234567')).toBe(
            'một triệu hai trăm ba mươi tư nghìn năm trăm sáu mươi bảy',
        );
        expect(convertNumber('0912345678')).toBe(
            'chín trăm mười hai triệu ba trăm bốn mươi lăm nghìn sáu trăm bảy mươi tám',
        );
    });

    it('groups up to eighteen digits', () => {
        expect(convertNumber('123456789012345678')).toBe(
            'một trăm hai mươi ba triệu tỷ bốn trăm năm mươi sáu nghìn tỷ ' +
            'bảy trăm tám mươi chín tỷ không trăm mười hai triệu ' +
            'ba trăm bốn mươi lăm nghìn sáu trăm bảy mươi tám',
        );
    });

    it('reads longer numbers digit by digit', () => {
        expect(convertNumber('1234567890123456789')).toBe(
            'một hai ba bốn năm sáu bảy tám chín không một hai ba bốn năm sáu bảy tám chín',
        );
        expect(readDigits('907')).toBe('chín không bảy');
    });

    it('returns non-numeric input unchanged', () => {
        expect(convertNumber('12a')).toBe('12a');
        expect(convertNumber('')).toBe('');
    });
});

describe('convertDecimal', () => {
    it('reads the fraction digit by digit', () => {
        expect(convertDecimal('3', '14')).toBe('ba phẩy một bốn');
        expect(convertDecimal('1', '05')).toBe('một phẩy không năm');
        expect(convertDecimal('1500', '25')).toBe('một nghìn năm trăm phẩy hai năm');
    });

    it('returns malformed parts as written', () => {
        expect(convertDecimal('3', 'x')).toBe('3,x');
        expect(convertDecimal('3', 'x', '.')).toBe('3.x');
    });
});
