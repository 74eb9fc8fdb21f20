import React from 'react';
import Card from 'react-bootstrap/Card';
import Icon from '@mdi/react';
import { mdiChartBoxOutline } from '@mdi/js';
import HistogramPlot from './HistogramPlot';
import { formatStat, summarize } from '../datasetUtils';
import type { PlottedData } from '../hooks/useSourceArbiter';

import '../styles/PlotContainer.scss';

interface PlotContainerProps {
    plotted: PlottedData | null;
}

const PlotContainer: React.FC<PlotContainerProps> = ({ plotted }) => {

    const summary = plotted ? summarize(plotted.values) : null;

    if (!plotted || !summary) {
        return (
            <Card className="plot-card h-100">
                <Card.Header>Histogram</Card.Header>
                <Card.Body className="plot-container-body">
                    <div className="placeholder-content info">
                        <Icon path={mdiChartBoxOutline} size={1.6} className="placeholder-icon text-muted" />
                        <h4>No Data</h4>
                        <p>Generate a distribution or load a file to display the histogram.</p>
                    </div>
                </Card.Body>
                <Card.Footer className="plot-card-footer">
                    <div className="summary-placeholder">&nbsp;</div>
                </Card.Footer>
            </Card>
        );
    }

    return (
        <Card className="plot-card h-100">
            <Card.Header>{`Histogram of ${plotted.label}`}</Card.Header>
            <Card.Body className="plot-container-body">
                <HistogramPlot values={plotted.values} source={plotted.source} label={plotted.label} />
            </Card.Body>
            <Card.Footer className="plot-card-footer">
                <div className="summary-box" data-testid="dataset-summary">
                    <div><strong>n:</strong> <span>{summary.count}</span></div>
                    <div><strong>Mean:</strong> <span>{formatStat(summary.mean)}</span></div>
                    <div><strong>SD:</strong> <span>{formatStat(summary.sd)}</span></div>
                    <div><strong>Range:</strong> <span>{formatStat(summary.min)} to {formatStat(summary.max)}</span></div>
                </div>
            </Card.Footer>
        </Card>
    );
};

export default PlotContainer;
