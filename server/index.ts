import type GlobalThis from './global';
declare const global: GlobalThis;
import settings from './config/index';
import { createServer } from './app';
import { installGlobals } from './global';

installGlobals();

const { server, wss } = createServer();

server.listen(settings.PORT, () => {
    console.log(global.color('green', '[Web]\t\t'), 'Server is running on', global.color('yellow', `http://localhost:${settings.PORT}`));
});

function shutdown(signal: string) {
    console.log(global.color('yellow', '[System]\t'), `${signal} received, closing...`);
    wss.clients.forEach((client) => client.terminate());
    wss.close();
    server.close((err) => {
        if (err) {
            console.error(global.color('red', '[System]\t'), err);
            process.exit(1);
        }
        process.exit(0);
    });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
