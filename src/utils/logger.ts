export interface Logger {
    debug(message: string): void;
    info(message: string): void;
    warn(message: string): void;
    error(message: string, error?: unknown): void;
}

export const createConsoleLogger = (debugEnabled: boolean): Logger => ({
    debug: message => {
        if (debugEnabled) {
            console.log(`== [MODE: DEBUG] ${message} ==`);
        }
    },
    info: message => console.log(message),
    warn: message => console.warn(message),
    error: (message, error) => {
        if (error === undefined) {
            console.error(message);
        } else {
            console.error(message, error);
        }
    },
});

const noop = () => {};

export const silentLogger: Logger = {
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
};
