export class FileParseError extends Error {
    readonly fileName: string;
    readonly line?: number;

    constructor(message: string, fileName: string, line?: number) {
        super(line === undefined ? `${fileName}: ${message}` : `${fileName}, line ${line}: ${message}`);
        this.name = 'FileParseError';
        this.fileName = fileName;
        this.line = line;
    }
}

export function describeError(err: unknown, fallback = 'Failed to process file.'): string {
    if (err instanceof Error) { return err.message; }
    if (typeof err === 'string') { return err; }
    return fallback;
}
