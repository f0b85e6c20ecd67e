import { convertDate, convertDatetime } from './dateReader';
import { convertDecimal, convertNumber } from './numberReader';

export type PassName =
    | 'datetime'
    | 'slashDate'
    | 'dashDate'
    | 'yearFirstDate'
    | 'hyphenSplit'
    | 'commaDecimal'
    | 'dotDecimal'
    | 'integer';

export interface RecognitionPass {
    name: PassName;
    pattern: RegExp;
    // groups are the pattern's capture groups, in order
    render: (groups: string[], match: string) => string;
}

export interface PassTrace {
    pass: PassName;
    text: string;
}

function replaceMatches(text: string, pattern: RegExp, render: RecognitionPass['render']): string {
    let output = '';
    let last = 0;

    for (const match of text.matchAll(pattern)) {
        const start = match.index ?? 0;
        output += text.slice(last, start) + render(match.slice(1), match[0]);
        last = start + match[0].length;
    }

    return output + text.slice(last);
}

export class RecognitionPipeline {
    /**
     * Order matters. Each pass sees the text left by the ones before it, and
     * every later pattern matches pieces of the earlier ones (a date's year is
     * a plain integer too), so the specific shapes have to be consumed first.
     */
    static readonly PASSES: readonly RecognitionPass[] = [
        {
            name: 'datetime',
            pattern: /(\d{4})-(\d{1,2})-(\d{1,2}) (\d{1,2}):(\d{1,2}):(\d{1,2})/g,
            render: ([year, month, day, hour, minute, second]) =>
                convertDatetime(year, month, day, hour, minute, second),
        },
        {
            name: 'slashDate',
            pattern: /(\d{1,2})\/(\d{1,2})\/(\d{4})/g,
            render: ([day, month, year]) => convertDate(day, month, year),
        },
        {
            name: 'dashDate',
            pattern: /(\d{1,2})-(\d{1,2})-(\d{4})/g,
            render: ([day, month, year]) => convertDate(day, month, year),
        },
        {
            name: 'yearFirstDate',
            pattern: /(\d{4})-(\d{1,2})-(\d{1,2})/g,
            render: ([year, month, day]) => convertDate(day, month, year),
        },
        {
            // dates are gone by now, the rest of the hyphens only join tokens
            name: 'hyphenSplit',
            pattern: /-/g,
            render: () => ' ',
        },
        {
            name: 'commaDecimal',
            pattern: /\b(\d+),(\d+)\b/g,
            render: ([integer, fraction]) => convertDecimal(integer, fraction, ','),
        },
        {
            name: 'dotDecimal',
            pattern: /\b(\d+)\.(\d+)\b/g,
            render: ([integer, fraction]) => convertDecimal(integer, fraction, '.'),
        },
        {
            name: 'integer',
            pattern: /\b\d{1,100}\b/g,
            render: (_groups, match) => convertNumber(match),
        },
    ];

    static run(text: string): string {
        return this.PASSES.reduce((current, pass) => replaceMatches(current, pass.pattern, pass.render), text);
    }

    /** Text as it stands after every pass, for debugging recognition order. */
    static trace(text: string): PassTrace[] {
        const passes: PassTrace[] = [];
        let current = text;
        for (const pass of this.PASSES) {
            current = replaceMatches(current, pass.pattern, pass.render);
            passes.push({ pass: pass.name, text: current });
        }
        return passes;
    }
}
