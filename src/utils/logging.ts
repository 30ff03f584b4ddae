import * as logPrefix from "loglevel-plugin-prefix";
import log = require("loglevel");

const levelNames: { [name: string]: log.LogLevelDesc } = {
    trace: log.levels.TRACE,
    debug: log.levels.DEBUG,
    info: log.levels.INFO,
    warn: log.levels.WARN,
    error: log.levels.ERROR,
    silent: log.levels.SILENT
};

/**
 * Parses a level name such as "debug" or "WARN".  Returns `defaultLevel`
 * when the name is missing or not a level.
 */
export function parseLogLevel(name: string | undefined, defaultLevel: log.LogLevelDesc = log.levels.INFO): log.LogLevelDesc {
    if (!name) {
        return defaultLevel;
    }
    const level = levelNames[name.toLowerCase()];
    return level !== undefined ? level : defaultLevel;
}

/**
 * Sets up the shared logger for command line use: messages go through
 * console.log with a `[LEVEL]` prefix at the level named by LOG_LEVEL.
 */
export function configureLogging(env: NodeJS.ProcessEnv = process.env): void {
    // Wrapping console.log instead of binding (default behaviour for loglevel)
    // so that anything patching console after startup is respected.
    // tslint:disable-next-line:no-console
    log.methodFactory = () => (...args: unknown[]) => console.log(...args);

    // Prefix log messages with the level.
    logPrefix.reg(log);
    logPrefix.apply(log, {
        format: level => `[${level}]`
    });

    log.setLevel(parseLogLevel(env["LOG_LEVEL"]));
}
