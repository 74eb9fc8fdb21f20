import React from 'react';
import Card from 'react-bootstrap/Card';
import Button from 'react-bootstrap/Button';
import Form from 'react-bootstrap/Form';
import Icon from '@mdi/react';
import { mdiTuneVariant, mdiChartBellCurve, mdiChartBar, mdiRestore } from '@mdi/js';

import FileUpload from './FileUpload';
import type { UploadedFile } from '../types';

import '../styles/SourceControls.scss';

interface SourceControlsProps {
    onGenerateNormal: () => void;
    onGeneratePoisson: () => void;
    onFileLoaded: (upload: UploadedFile) => void;
    onFileError: (err: unknown) => void;
    onResetFileInput: () => void;
    hasHeader: boolean;
    onHeaderChange: (hasHeader: boolean) => void;
    fileInputKey: number;
    loadedFileName: string;
}

const SourceControls: React.FC<SourceControlsProps> = ({
                                                           onGenerateNormal,
                                                           onGeneratePoisson,
                                                           onFileLoaded,
                                                           onFileError,
                                                           onResetFileInput,
                                                           hasHeader,
                                                           onHeaderChange,
                                                           fileInputKey,
                                                           loadedFileName,
                                                       }) => {
    return (
        <Card className="source-controls-card shadow-sm">
            <Card.Header>
                <Icon path={mdiTuneVariant} size={0.9} className="header-icon" />
                Data Sources
            </Card.Header>
            <Card.Body>
                <div className="control-section generator-control d-grid gap-2">
                    <Button variant="outline-primary" onClick={onGenerateNormal}>
                        <Icon path={mdiChartBellCurve} size={0.8} className="me-2" />
                        Generate normal distribution
                    </Button>
                    <Button variant="outline-primary" onClick={onGeneratePoisson}>
                        <Icon path={mdiChartBar} size={0.8} className="me-2" />
                        Generate Poisson distribution
                    </Button>
                </div>

                <hr />

                <div className="control-section file-control">
                    {/* Remounting on a new key clears the pending selection. */}
                    <FileUpload
                        key={fileInputKey}
                        onFileLoaded={onFileLoaded}
                        onError={onFileError}
                        currentFileName={loadedFileName}
                    />
                    <Form.Check
                        id="header-checkbox"
                        type="checkbox"
                        className="mt-2"
                        label="1st row of the file is a header"
                        checked={hasHeader}
                        onChange={(event: React.ChangeEvent<HTMLInputElement>) => onHeaderChange(event.target.checked)}
                    />
                    <Button variant="outline-secondary" size="sm" className="mt-2" onClick={onResetFileInput}>
                        <Icon path={mdiRestore} size={0.7} className="me-1" />
                        Reset file input
                    </Button>
                </div>
            </Card.Body>
        </Card>
    );
};

export default SourceControls;
