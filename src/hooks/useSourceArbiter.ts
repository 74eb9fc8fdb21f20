import { useCallback, useRef, useState } from 'react';
import { arbitrate, initialTriggerState } from '../sourceArbiter';
import { normalSamples, poissonSamples, type RandomSource } from '../distributions';
import { parseNumericColumn } from '../numericColumn';
import { describeError } from '../errors';
import { DEFAULT_HAS_HEADER, POISSON_RATE, SAMPLE_SIZE, SOURCE_LABELS } from '../config';
import type { Dataset, DataSourceKind, TriggerCounts, TriggerState, UploadedFile } from '../types';

export interface SourceArbiterOptions {
    rng?: RandomSource;
}

export interface PlottedData {
    source: DataSourceKind;
    label: string;
    values: Dataset;
}

const ZERO_COUNTS: TriggerCounts = { generatorA: 0, generatorB: 0, fileLoad: 0 };

/**
 * Session-scoped owner of the trigger counters. Every user action computes the
 * next observed counts and runs the arbiter synchronously in its handler.
 */
export function useSourceArbiter({ rng = Math.random }: SourceArbiterOptions = {}) {
    const countsRef = useRef<TriggerCounts>({ ...ZERO_COUNTS });
    const triggerStateRef = useRef<TriggerState>(initialTriggerState(ZERO_COUNTS));

    const [counts, setCounts] = useState<TriggerCounts>(countsRef.current);
    const [plotted, setPlotted] = useState<PlottedData | null>(null);
    const [error, setError] = useState<string>('');
    const [hasHeader, setHasHeader] = useState<boolean>(DEFAULT_HAS_HEADER);
    const [fileInputKey, setFileInputKey] = useState<number>(0);
    const [loadedFileName, setLoadedFileName] = useState<string>('');

    const fire = useCallback((next: TriggerCounts, upload: UploadedFile | null) => {
        countsRef.current = next;
        setCounts(next);

        let fileLabel = upload?.name ?? SOURCE_LABELS.file;
        try {
            const outcome = arbitrate(next, triggerStateRef.current, {
                normal: () => normalSamples(SAMPLE_SIZE, rng),
                poisson: () => poissonSamples(SAMPLE_SIZE, POISSON_RATE, rng),
                file: () => {
                    if (!upload) {
                        throw new Error('No file has been selected.');
                    }
                    const parsed = parseNumericColumn({ ...upload, hasHeader });
                    fileLabel = parsed.columnName;
                    return parsed.values;
                },
            });
            triggerStateRef.current = outcome.state;

            if (outcome.source === null || outcome.dataset === null) {
                setPlotted(null);
                return;
            }
            setError('');
            setPlotted({
                source: outcome.source,
                label: outcome.source === 'file' ? fileLabel : SOURCE_LABELS[outcome.source],
                values: outcome.dataset,
            });
            if (outcome.source === 'file' && upload) {
                setLoadedFileName(upload.name);
            }
        } catch (err: unknown) {
            console.error('Failed to load data:', err);
            setError(describeError(err));
        }
    }, [rng, hasHeader]);

    const generateNormal = useCallback(() => {
        const current = countsRef.current;
        fire({ ...current, generatorA: current.generatorA + 1 }, null);
    }, [fire]);

    const generatePoisson = useCallback(() => {
        const current = countsRef.current;
        fire({ ...current, generatorB: current.generatorB + 1 }, null);
    }, [fire]);

    const loadFile = useCallback((upload: UploadedFile) => {
        const current = countsRef.current;
        fire({ ...current, fileLoad: current.fileLoad + 1 }, upload);
    }, [fire]);

    const resetFileInput = useCallback(() => {
        setFileInputKey(key => key + 1);
    }, []);

    const reportError = useCallback((err: unknown) => {
        console.error('Failed to load file:', err);
        setError(describeError(err));
    }, []);

    const dismissError = useCallback(() => setError(''), []);

    return {
        counts,
        plotted,
        error,
        hasHeader,
        setHasHeader,
        fileInputKey,
        loadedFileName,
        generateNormal,
        generatePoisson,
        loadFile,
        resetFileInput,
        reportError,
        dismissError,
    };
}
