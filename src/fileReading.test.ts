import { afterEach, describe, expect, it, vi } from 'vitest';
import { readTextFile } from './fileReading';
import { FileParseError } from './errors';

type ReadOutcome = 'error' | 'abort' | 'binary';

// Stands in for the browser reader; settles on the next microtask.
const fakeReader = (outcome: ReadOutcome) => class {
    result: string | ArrayBuffer | null = null;
    error: { message: string } | null = null;
    onload: (() => void) | null = null;
    onerror: (() => void) | null = null;
    onabort: (() => void) | null = null;

    abort() {
        this.onabort?.();
    }

    readAsText() {
        queueMicrotask(() => {
            if (outcome === 'error') {
                this.error = { message: 'disk unavailable' };
                this.onerror?.();
            } else if (outcome === 'abort') {
                this.abort();
            } else {
                this.result = new ArrayBuffer(4);
                this.onload?.();
            }
        });
    }
};

const file = () => new File(['x\n1\n2\n'], 'values.csv', { type: 'text/csv' });

const rejection = async (promise: Promise<string>): Promise<FileParseError> => {
    try {
        await promise;
    } catch (err) {
        if (err instanceof FileParseError) return err;
        throw err;
    }
    throw new Error('expected the read to fail');
};

describe('readTextFile', () => {
    afterEach(() => {
        vi.unstubAllGlobals();
    });

    it('resolves with the file contents', async () => {
        await expect(readTextFile(file())).resolves.toBe('x\n1\n2\n');
    });

    it('rejects a read error with the file name', async () => {
        vi.stubGlobal('FileReader', fakeReader('error'));

        const err = await rejection(readTextFile(file()));
        expect(err.fileName).toBe('values.csv');
        expect(err.message).toBe('values.csv: disk unavailable');
    });

    it('rejects an aborted read', async () => {
        vi.stubGlobal('FileReader', fakeReader('abort'));

        const err = await rejection(readTextFile(file()));
        expect(err.fileName).toBe('values.csv');
        expect(err.message).toBe('values.csv: file reading was aborted');
    });

    it('rejects content that is not text', async () => {
        vi.stubGlobal('FileReader', fakeReader('binary'));

        const err = await rejection(readTextFile(file()));
        expect(err.message).toBe('values.csv: file content could not be read as text');
    });

    it('rejects when the signal is already aborted', async () => {
        const controller = new AbortController();
        controller.abort();

        const err = await rejection(readTextFile(file(), controller.signal));
        expect(err.message).toBe('values.csv: file reading was aborted');
    });

    it('aborts the reader when the signal fires mid-read', async () => {
        vi.stubGlobal('FileReader', class {
            result: string | null = null;
            error: { message: string } | null = null;
            onload: (() => void) | null = null;
            onerror: (() => void) | null = null;
            onabort: (() => void) | null = null;
            abort() {
                this.onabort?.();
            }
            readAsText() {
                // Never loads on its own.
            }
        });
        const controller = new AbortController();

        const pending = readTextFile(file(), controller.signal);
        controller.abort();

        const err = await rejection(pending);
        expect(err.message).toBe('values.csv: file reading was aborted');
    });
});
