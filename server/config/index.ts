/**
 * Runtime settings, read once from the environment (and `.env` when present):
 *
 * PORT                 - HTTP / WebSocket port.
 * MAX_TEXT_LENGTH      - Longest text unit accepted per request, in UTF-16 code units.
 * MAX_BATCH_LINES      - Most lines accepted by POST /normalize/batch.
 * LOG_NORMALIZATION    - "true" logs every normalized text unit.
 * JSON_LIMIT           - Body size limit handed to express.json().
 */
import { config } from 'dotenv';

config();

function readInt(value: string | undefined, fallback: number): number {
    const parsed = Number.parseInt(value ?? '', 10);
    return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

const settings = {
    PORT: readInt(process.env.PORT, 5000),
    MAX_TEXT_LENGTH: readInt(process.env.MAX_TEXT_LENGTH, 100000),
    MAX_BATCH_LINES: readInt(process.env.MAX_BATCH_LINES, 1000),
    LOG_NORMALIZATION: process.env.LOG_NORMALIZATION === 'true',
    JSON_LIMIT: process.env.JSON_LIMIT || '1mb',
};

export default settings;
