import color from './colorized';

export default interface GlobalThis {
    color: typeof color;
}

declare const global: GlobalThis;

export function installGlobals(): void {
    global.color = color;
}
