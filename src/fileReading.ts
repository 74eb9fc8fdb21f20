import { FileParseError } from './errors';

export function readTextFile(file: File, signal?: AbortSignal): Promise<string> {
    return new Promise((resolve, reject) => {
        if (signal?.aborted) {
            reject(new FileParseError('file reading was aborted', file.name));
            return;
        }

        const reader = new FileReader();
        const onAbortSignal = () => reader.abort();
        const settle = () => signal?.removeEventListener('abort', onAbortSignal);

        reader.onabort = () => {
            settle();
            reject(new FileParseError('file reading was aborted', file.name));
        };
        reader.onerror = () => {
            settle();
            reject(new FileParseError(reader.error?.message || 'file could not be read', file.name));
        };
        reader.onload = () => {
            settle();
            const content = reader.result;
            if (typeof content !== 'string') {
                reject(new FileParseError('file content could not be read as text', file.name));
                return;
            }
            resolve(content);
        };
        signal?.addEventListener('abort', onAbortSignal, { once: true });
        reader.readAsText(file);
    });
}
