import type { Accept } from 'react-dropzone';
import type { DataSourceKind } from './types';

export const SAMPLE_SIZE = 1000;
export const POISSON_RATE = 2;
export const DEFAULT_HAS_HEADER = true;

export const textFileAccept: Accept = {
    'text/csv': ['.csv'],
    'text/comma-separated-values': ['.csv'],
    'text/plain': ['.txt'],
};

export const SOURCE_LABELS: Record<DataSourceKind, string> = {
    normal: 'normal distribution',
    poisson: 'Poisson distribution',
    file: 'loaded file',
};

export const SOURCE_COLORS: Record<DataSourceKind, string> = {
    normal: '#0d6efd',
    poisson: '#6f42c1',
    file: '#198754',
};
