import Container from 'react-bootstrap/Container';
import Row from 'react-bootstrap/Row';
import Col from 'react-bootstrap/Col';
import Alert from 'react-bootstrap/Alert';
import Icon from '@mdi/react';
import { mdiAlertCircleOutline } from '@mdi/js';

import SourceControls from './components/SourceControls.tsx';
import PlotContainer from './components/PlotContainer';
import { useSourceArbiter, type SourceArbiterOptions } from './hooks/useSourceArbiter';

import './App.scss';

function App(props: SourceArbiterOptions) {
    const {
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
    } = useSourceArbiter(props);

    return (
        <Container fluid="lg" className="app-container py-4 py-md-5">
            <h1 className="app-title">1 Histogram: 2 sources of data</h1>

            {error && (
                <Row className="justify-content-center mb-4">
                    <Col xs={12} md={10} lg={8}>
                        <Alert variant="danger" onClose={dismissError} dismissible className="app-alert d-flex align-items-center shadow-sm">
                            <Icon path={mdiAlertCircleOutline} size={1.2} className="me-3 flex-shrink-0" />
                            <div>
                                <Alert.Heading as="h6" className="mb-1">Error Loading Data</Alert.Heading>
                                <p className="mb-0 small">{error}</p>
                            </div>
                        </Alert>
                    </Col>
                </Row>
            )}

            <div className="main-content-area">
                <Row className="h-100">
                    <Col md={4} lg={3} className="controls-column mb-4 mb-md-0">
                        <SourceControls
                            onGenerateNormal={generateNormal}
                            onGeneratePoisson={generatePoisson}
                            onFileLoaded={loadFile}
                            onFileError={reportError}
                            onResetFileInput={resetFileInput}
                            hasHeader={hasHeader}
                            onHeaderChange={setHasHeader}
                            fileInputKey={fileInputKey}
                            loadedFileName={loadedFileName}
                        />
                    </Col>

                    <Col md={8} lg={9} className="visualization-column d-flex flex-column">
                        <PlotContainer plotted={plotted} />
                    </Col>
                </Row>
            </div>

            <footer className="app-footer">
                Histogram Sources - {new Date().getFullYear()}
            </footer>
        </Container>
    );
}

export default App;
