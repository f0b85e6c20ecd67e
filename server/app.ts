import type GlobalThis from './global';
declare const global: GlobalThis;
import express, { Response } from 'express';
import http from 'http';
import WebSocket, { WebSocketServer } from 'ws';
import cors from 'cors';
import settings from './config/index';
import {
    InvalidInputError,
    NormalizationResult,
    NormalizerError,
    NormalizerService,
    TextTooLongError,
} from './services/normalizer.service';
import { prepareForRecognition } from './services/normalizer';
import { RecognitionPipeline } from './services/processor';

type SocketReply =
    | { type: 'normalized'; text: string }
    | { type: 'error'; text: string };

export interface NormalizerServer {
    app: express.Express;
    server: http.Server;
    wss: WebSocketServer;
}

function sendError(res: Response, tag: string, e: unknown) {
    if (e instanceof NormalizerError) {
        res.status(e.status).send(e.message);
        return;
    }
    console.log(global.color('red', tag), 'Request failed', e);
    res.status(500).send(String(e));
}

function isStringArray(value: unknown): value is string[] {
    return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

// Plain text, or {"type":"normalize","text":"..."}
export function parseSocketMessage(raw: string): string {
    if (!raw.trimStart().startsWith('{')) return raw;

    const msg: unknown = JSON.parse(raw);
    if (
        typeof msg === 'object' && msg !== null &&
        'type' in msg && msg.type === 'normalize' &&
        'text' in msg && typeof msg.text === 'string'
    ) {
        return msg.text;
    }
    throw new InvalidInputError('Expected {"type":"normalize","text":"..."}');
}

export function createServer(normalizer: NormalizerService = NormalizerService.getInstance()): NormalizerServer {
    const app = express();
    const server = http.createServer(app);
    const wss = new WebSocketServer({ server });

    app.use(cors());
    app.use(express.json({ limit: settings.JSON_LIMIT }));

    // --- API ---
    app.get('/health', (req, res) => {
        res.json({ status: 'ok', processed: normalizer.processedCount });
    });

    app.post('/normalize', (req, res) => {
        try {
            const text: unknown = req.body?.text;
            if (typeof text !== 'string') {
                res.status(400).send('Invalid input');
                return;
            }
            res.json({ text: normalizer.normalize(text, 'http').output });
        } catch (e) {
            sendError(res, '[Web]\t\t', e);
        }
    });

    app.post('/normalize/batch', (req, res) => {
        try {
            const lines: unknown = req.body?.lines;
            if (!isStringArray(lines)) {
                res.status(400).send('Invalid input');
                return;
            }
            const results = normalizer.normalizeBatch(lines, 'http-batch');
            res.json({ lines: results.map((result) => result.output) });
        } catch (e) {
            sendError(res, '[Web]\t\t', e);
        }
    });

    app.post('/normalize/trace', (req, res) => {
        try {
            const text: unknown = req.body?.text;
            if (typeof text !== 'string') {
                res.status(400).send('Invalid input');
                return;
            }
            if (text.length > settings.MAX_TEXT_LENGTH) {
                throw new TextTooLongError(text.length, settings.MAX_TEXT_LENGTH);
            }
            res.json({ passes: RecognitionPipeline.trace(prepareForRecognition(text)) });
        } catch (e) {
            sendError(res, '[Web]\t\t', e);
        }
    });

    // --- WEBSOCKET HANDLING ---
    wss.on('connection', (ws: WebSocket, req: http.IncomingMessage) => {
        const url = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);
        const pathname = url.pathname;

        // 1. MONITOR: every normalized text unit, whoever asked for it
        if (pathname === '/monitor') {
            console.log(global.color('blue', '[Client]\t'), 'Monitor');

            const onNormalized = (result: NormalizationResult) => {
                if (ws.readyState === WebSocket.OPEN) {
                    ws.send(JSON.stringify({ type: 'normalized', ...result }));
                }
            };
            normalizer.on('normalized', onNormalized);

            ws.on('close', () => {
                normalizer.off('normalized', onNormalized);
                console.log(global.color('yellow', '[Client]\t'), 'Monitor disconnected');
            });
            return;
        }

        // 2. NORMALIZE: one text unit per message
        if (pathname === '/normalize') {
            console.log(global.color('blue', '[Client]\t'), 'Normalize');

            const reply = (payload: SocketReply) => {
                if (ws.readyState === WebSocket.OPEN) {
                    ws.send(JSON.stringify(payload));
                }
            };

            ws.on('message', (data) => {
                try {
                    const text = parseSocketMessage(data.toString());
                    reply({ type: 'normalized', text: normalizer.normalize(text, 'ws').output });
                } catch (err) {
                    reply({ type: 'error', text: err instanceof Error ? err.message : String(err) });
                }
            });

            ws.on('close', () => {
                console.log(global.color('yellow', '[Client]\t'), 'Normalize disconnected');
            });
            return;
        }

        console.log(global.color('yellow', '[Client]\t'), `Unknown channel ${pathname}`);
        ws.close(1008, 'Unknown channel');
    });

    return { app, server, wss };
}
