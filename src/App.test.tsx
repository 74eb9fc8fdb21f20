import { beforeEach, describe, expect, it, vi } from 'vitest';
import { render, screen } from '@testing-library/react';
import userEvent from '@testing-library/user-event';
import App from './App';
import { seededRandom } from './testing/seededRandom';

// Plotly needs a real canvas; the stub only reports how many points it got.
vi.mock('react-plotly.js', async () => {
    const { createElement } = await import('react');
    return {
        default: ({ data }: { data: { x?: unknown }[] }) => {
            const x = data[0]?.x;
            return createElement('div', { 'data-testid': 'plotly', 'data-points': Array.isArray(x) ? x.length : 0 });
        },
    };
});

const csv = (name: string, text: string): File => new File([text], name, { type: 'text/csv' });

describe('App', () => {
    beforeEach(() => {
        vi.spyOn(console, 'debug').mockImplementation(() => undefined);
        vi.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    it('shows a placeholder before any source fires', () => {
        render(<App />);

        expect(screen.getByText('No Data')).toBeInTheDocument();
        expect(screen.queryByTestId('plotly')).not.toBeInTheDocument();
        expect(screen.queryByText('Error Loading Data')).not.toBeInTheDocument();
    });

    it('plots the normal and Poisson generators', async () => {
        const user = userEvent.setup();
        render(<App rng={seededRandom(21)} />);

        await user.click(screen.getByRole('button', { name: /generate normal distribution/i }));
        expect(screen.getByText('Histogram of normal distribution')).toBeInTheDocument();
        expect(screen.getByTestId('plotly')).toHaveAttribute('data-points', '1000');
        expect(screen.getByTestId('dataset-summary')).toHaveTextContent('n: 1000');

        await user.click(screen.getByRole('button', { name: /generate poisson distribution/i }));
        expect(screen.getByText('Histogram of Poisson distribution')).toBeInTheDocument();
        expect(screen.getByTestId('plotly')).toHaveAttribute('data-points', '1000');
    });

    it('plots an uploaded file and re-fires it after a reset', async () => {
        const user = userEvent.setup();
        render(<App rng={seededRandom(4)} />);

        await user.upload(screen.getByTestId('file-input'), csv('values.csv', 'height\n1\n2\n3\n4\n'));
        expect(await screen.findByText('Histogram of height')).toBeInTheDocument();
        expect(screen.getByTestId('plotly')).toHaveAttribute('data-points', '4');
        expect(screen.getByText('Loaded: values.csv')).toBeInTheDocument();

        await user.click(screen.getByRole('button', { name: /generate normal distribution/i }));
        expect(screen.getByText('Histogram of normal distribution')).toBeInTheDocument();

        const inputBeforeReset = screen.getByTestId('file-input');
        await user.click(screen.getByRole('button', { name: /reset file input/i }));
        expect(screen.getByTestId('file-input')).not.toBe(inputBeforeReset);
        expect(screen.getByText('Histogram of normal distribution')).toBeInTheDocument();

        await user.upload(screen.getByTestId('file-input'), csv('values.csv', 'height\n1\n2\n3\n4\n'));
        expect(await screen.findByText('Histogram of height')).toBeInTheDocument();
        expect(screen.getByTestId('plotly')).toHaveAttribute('data-points', '4');
    });

    it('honours the header checkbox', async () => {
        const user = userEvent.setup();
        render(<App />);

        await user.click(screen.getByLabelText('1st row of the file is a header'));
        await user.upload(screen.getByTestId('file-input'), csv('plain.csv', '5\n6\n7\n'));

        expect(await screen.findByText('Histogram of V1')).toBeInTheDocument();
        expect(screen.getByTestId('plotly')).toHaveAttribute('data-points', '3');
    });

    it('reports a malformed file without dropping the current plot', async () => {
        const user = userEvent.setup();
        render(<App rng={seededRandom(8)} />);

        await user.click(screen.getByRole('button', { name: /generate poisson distribution/i }));
        await user.upload(screen.getByTestId('file-input'), csv('bad.csv', 'a,b\n1,2\n'));

        expect(await screen.findByText('Error Loading Data')).toBeInTheDocument();
        expect(screen.getByText('bad.csv, line 1: expected exactly one column, found 2')).toBeInTheDocument();
        expect(screen.getByText('Histogram of Poisson distribution')).toBeInTheDocument();
    });

    it('reports a rejected file type', async () => {
        const user = userEvent.setup({ applyAccept: false });
        render(<App />);

        await user.upload(screen.getByTestId('file-input'), new File(['x'], 'image.png', { type: 'image/png' }));

        expect(await screen.findByText('Error Loading Data')).toBeInTheDocument();
        expect(screen.getByText('No Data')).toBeInTheDocument();
    });
});
