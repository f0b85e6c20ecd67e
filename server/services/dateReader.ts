import { MONTH_WORDS } from './lexicon';
import { convertNumber } from './numberReader';

export interface DateComponents {
    day: string;
    month: string;
    year: string;
}

export interface DatetimeComponents extends DateComponents {
    hour: string;
    minute: string;
    second: string;
}

// "05" -> "5", "00" -> "0"
function trimZeros(value: string): string {
    return value.replace(/^0+/, '') || '0';
}

function readMonth(month: string): string {
    return MONTH_WORDS[month] ?? convertNumber(month);
}

function composeDate({ day, month, year }: DateComponents): string {
    return `ngày ${convertNumber(day)} tháng ${readMonth(month)} năm ${convertNumber(year)}`;
}

/**
 * Components are passed already resolved, whatever order the source text
 * wrote them in.
 */
export function convertDate(day: string, month: string, year: string): string {
    return composeDate({ day: trimZeros(day), month: trimZeros(month), year });
}

export function convertDatetime(
    year: string,
    month: string,
    day: string,
    hour: string,
    minute: string,
    second: string,
): string {
    const parts: DatetimeComponents = {
        day: trimZeros(day),
        month: trimZeros(month),
        year,
        hour: trimZeros(hour),
        minute: trimZeros(minute),
        second: trimZeros(second),
    };

    const time = `giờ ${convertNumber(parts.hour)} phút ${convertNumber(parts.minute)} giây ${convertNumber(parts.second)}`;
    return `${composeDate(parts)} ${time}`;
}
