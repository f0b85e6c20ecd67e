import { RecognitionPipeline } from './processor';
import { collapseWhitespace, separateAlphanumeric, spaceTrailingDigits, splitIdentifierMarks } from './textUtils';

// What the recognition passes expect to see
export function prepareForRecognition(text: string): string {
    const collapsed = collapseWhitespace(text.normalize('NFC'));
    return splitIdentifierMarks(separateAlphanumeric(collapsed));
}

/**
 * Spells out every number, date, datetime and decimal in `text` as
 * Vietnamese words for speech synthesis. Everything else passes through
 * with whitespace collapsed.
 */
export function normalize(text: string): string {
    if (!text) return '';

    const recognized = RecognitionPipeline.run(prepareForRecognition(text));
    return collapseWhitespace(spaceTrailingDigits(recognized));
}
