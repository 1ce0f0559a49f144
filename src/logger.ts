import log from 'electron-log/node';
import type { LogLevelOption } from './config';

// Console only until a log file is configured
log.transports.console.level = 'info';
log.transports.file.level = false;

log.variables.process = 'LabelComposer';

export interface LoggingOptions {
    level: LogLevelOption;
    file?: string;
}

export function configureLogging(options: LoggingOptions): void {
    log.transports.console.level = options.level;

    if (options.file) {
        const file = options.file;
        log.transports.file.resolvePathFn = () => file;
        log.transports.file.level = options.level;
        log.info('[Logger] Writing logs to:', log.transports.file.getFile().path);
    } else {
        log.transports.file.level = false;
    }
}

export default log;
