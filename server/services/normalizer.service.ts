import type GlobalThis from '../global';
declare const global: GlobalThis;
import { EventEmitter } from 'events';
import settings from '../config/index';
import { normalize } from './normalizer';

export interface NormalizationResult {
    input: string;
    output: string;
    source: string;
    elapsedMs: number;
}

// Rejected input; `status` is what the HTTP layer answers with
export class NormalizerError extends Error {
    constructor(message: string, public readonly status: number) {
        super(message);
        this.name = new.target.name;
    }
}

export class TextTooLongError extends NormalizerError {
    constructor(length: number, limit: number) {
        super(`Text is ${length} characters long, the limit is ${limit}`, 413);
    }
}

export class BatchTooLargeError extends NormalizerError {
    constructor(count: number, limit: number) {
        super(`Batch has ${count} lines, the limit is ${limit}`, 413);
    }
}

export class InvalidInputError extends NormalizerError {
    constructor(message: string = 'Invalid input') {
        super(message, 400);
    }
}

export class NormalizerService extends EventEmitter {
    private static instance: NormalizerService;
    private processed = 0;

    private constructor() {
        super();
        // one listener per /monitor socket
        this.setMaxListeners(0);
    }

    public static getInstance(): NormalizerService {
        if (!NormalizerService.instance) {
            NormalizerService.instance = new NormalizerService();
        }
        return NormalizerService.instance;
    }

    public get processedCount(): number {
        return this.processed;
    }

    public normalize(text: string, source: string = 'api'): NormalizationResult {
        if (text.length > settings.MAX_TEXT_LENGTH) {
            throw new TextTooLongError(text.length, settings.MAX_TEXT_LENGTH);
        }

        const started = performance.now();
        const output = normalize(text);
        const result: NormalizationResult = {
            input: text,
            output,
            source,
            elapsedMs: performance.now() - started,
        };

        this.processed++;
        if (settings.LOG_NORMALIZATION) {
            console.log(global.color('cyan', `[Normalizer]\t`), `${source}: "${text.substring(0, 30)}..." -> "${output.substring(0, 30)}..."`);
        }
        this.emit('normalized', result);
        return result;
    }

    /** One text unit per line. */
    public normalizeBatch(lines: string[], source: string = 'batch'): NormalizationResult[] {
        if (lines.length > settings.MAX_BATCH_LINES) {
            throw new BatchTooLargeError(lines.length, settings.MAX_BATCH_LINES);
        }
        const tooLong = lines.find((line) => line.length > settings.MAX_TEXT_LENGTH);
        if (tooLong !== undefined) {
            throw new TextTooLongError(tooLong.length, settings.MAX_TEXT_LENGTH);
        }
        return lines.map((line) => this.normalize(line, source));
    }
}
