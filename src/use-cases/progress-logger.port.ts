export interface ProgressLogger {
    info(message: string): void;
    warn(message: string): void;
    debug(message: string): void;
}
