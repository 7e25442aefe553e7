import path from "path";
import pino from "pino";
import pretty from "pino-pretty";
import dotenv from "dotenv";
import { DEBUG_LOG_FILE_NAME } from "../constants";

dotenv.config({
    quiet: process.env.NODE_ENV === 'test',
});

export type Logger = pino.Logger;

export interface LoggingOptions {
    debug: boolean;
    logFile?: string;
}

// Silent until the CLI opts in with --debug; stdout is reserved for the report
let root: Logger = pino({ level: "silent" });

export function setupLogging({ debug, logFile }: LoggingOptions): Logger {
    if (!debug || process.env.NODE_ENV === 'test') {
        root = pino({ level: "silent" });
        return root;
    }

    const file = logFile ?? path.join(process.cwd(), DEBUG_LOG_FILE_NAME);

    const streams = pino.multistream([
        {
            level: "debug",
            stream: pino.destination({ dest: file, append: true, sync: true, mkdir: true }),
        },
        {
            level: "debug",
            stream: pretty({
                destination: 2,
                sync: true,
                colorize: process.stderr.isTTY,
                translateTime: "UTC:yyyy-mm-dd HH:MM:ss.l'Z'",
                ignore: "pid,hostname",
                messageFormat: "{name} - {msg}",
            }),
        },
    ]);

    root = pino(
        {
            level: "debug",
            timestamp: pino.stdTimeFunctions.isoTime,
            base: { pid: process.pid },
        },
        streams
    );

    root.debug({ logFile: file }, "Debug logging enabled");
    return root;
}

export function getLogger(name: string): Logger {
    return root.child({ name });
}
