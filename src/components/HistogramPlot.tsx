import React, { useMemo } from 'react';
import Plot from 'react-plotly.js';
import type { Data, Layout, Font } from 'plotly.js';
import { sturgesBins } from '../datasetUtils';
import { SOURCE_COLORS } from '../config';
import type { Dataset, DataSourceKind } from '../types';

import '../styles/HistogramPlot.scss';

interface HistogramPlotProps {
    values: Dataset;
    source: DataSourceKind;
    label: string;
}

const FONT_FAMILY = 'system-ui, -apple-system, BlinkMacSystemFont, "Segoe UI", Roboto, Oxygen, Ubuntu, Cantarell, "Open Sans", "Helvetica Neue", sans-serif';
const AXIS_TICK_COLOR = '#6c757d';
const AXIS_LABEL_COLOR = '#6c757d';
const AXIS_LINE_COLOR = '#dee2e6';
const AXIS_GRID_COLOR = '#f1f3f5';
const PAPER_BG_COLOR = 'white';
const PLOT_BG_COLOR = 'white';
const TEXT_COLOR = '#212529';
const HOVER_BG_COLOR = 'white';
const HOVER_BORDER_COLOR = '#dee2e6';

const BASE_FONT: Partial<Font> = { family: FONT_FAMILY, size: 11, color: TEXT_COLOR };
const AXIS_TICK_FONT: Partial<Font> = { family: FONT_FAMILY, size: 9, color: AXIS_TICK_COLOR };
const AXIS_TITLE_FONT: Partial<Font> = { family: FONT_FAMILY, size: 10, color: AXIS_LABEL_COLOR };
const HOVER_FONT: Partial<Font> = { family: FONT_FAMILY, size: 12.8, color: TEXT_COLOR };

const HistogramPlot: React.FC<HistogramPlotProps> = ({ values, source, label }) => {

    const traces = useMemo((): Data[] => [{
        x: values,
        type: 'histogram',
        name: label,
        nbinsx: sturgesBins(values.length),
        marker: {
            color: SOURCE_COLORS[source],
            opacity: 0.75,
            line: { color: 'white', width: 1 },
        },
        hovertemplate: 'Range: %{x}<br>Count: %{y}<extra></extra>',
    }], [values, source, label]);

    const commonAxisSettings = {
        gridcolor: AXIS_GRID_COLOR,
        zerolinecolor: AXIS_LINE_COLOR,
        linecolor: AXIS_LINE_COLOR,
        tickfont: AXIS_TICK_FONT,
        automargin: true,
    };

    const layout: Partial<Layout> = {
        autosize: true,
        margin: { l: 50, r: 20, b: 50, t: 10, pad: 4 },
        bargap: 0.02,
        showlegend: false,
        xaxis: { ...commonAxisSettings, title: { text: label, font: AXIS_TITLE_FONT } },
        yaxis: { ...commonAxisSettings, title: { text: 'Frequency', font: AXIS_TITLE_FONT } },
        paper_bgcolor: PAPER_BG_COLOR,
        plot_bgcolor: PLOT_BG_COLOR,
        font: BASE_FONT,
        hoverlabel: {
            bgcolor: HOVER_BG_COLOR,
            bordercolor: HOVER_BORDER_COLOR,
            font: HOVER_FONT,
            align: 'left',
        },
    };

    return (
        <div className="histogram-wrapper">
            <Plot
                data={traces}
                layout={layout}
                style={{ width: '100%', height: '100%' }}
                useResizeHandler={true}
                config={{ responsive: true, displaylogo: false, modeBarButtonsToRemove: ['sendDataToCloud', 'lasso2d', 'select2d'] }}
            />
        </div>
    );
}

export default HistogramPlot;
