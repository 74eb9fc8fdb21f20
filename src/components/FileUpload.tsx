import React, { useCallback, useEffect, useRef, useState } from 'react';
import { useDropzone, type FileRejection } from 'react-dropzone';
import Spinner from 'react-bootstrap/Spinner';
import Icon from '@mdi/react';
import { mdiFileUploadOutline, mdiCheckCircleOutline } from '@mdi/js';
import { textFileAccept } from '../config';
import { FileParseError } from '../errors';
import { readTextFile } from '../fileReading';
import type { UploadedFile } from '../types';

import '../styles/FileUpload.scss';

interface FileUploadProps {
    onFileLoaded: (upload: UploadedFile) => void;
    onError: (err: unknown) => void;
    currentFileName?: string;
}

const FileUpload: React.FC<FileUploadProps> = ({ onFileLoaded, onError, currentFileName }) => {
    const [reading, setReading] = useState<boolean>(false);
    const pendingReadRef = useRef<AbortController | null>(null);

    // A remount (reset) discards whatever selection is still being read.
    useEffect(() => () => pendingReadRef.current?.abort(), []);

    const onDrop = useCallback((acceptedFiles: File[], fileRejections: FileRejection[]) => {
        if (fileRejections.length > 0 || acceptedFiles.length !== 1) {
            const names = [...acceptedFiles.map(f => f.name), ...fileRejections.map(r => r.file.name)];
            const reason = fileRejections[0]?.errors[0]?.message ?? 'Please choose a single text file.';
            onError(new FileParseError(reason, names.join(', ') || 'upload'));
            return;
        }
        const file = acceptedFiles[0];
        pendingReadRef.current?.abort();
        const controller = new AbortController();
        pendingReadRef.current = controller;
        setReading(true);
        void readTextFile(file, controller.signal)
            .then(text => {
                if (!controller.signal.aborted) onFileLoaded({ name: file.name, text });
            })
            .catch((err: unknown) => {
                if (!controller.signal.aborted) onError(err);
            })
            .finally(() => {
                if (!controller.signal.aborted) setReading(false);
            });
    }, [onFileLoaded, onError]);

    const { getRootProps, getInputProps, isDragActive } = useDropzone({
        onDrop,
        accept: textFileAccept,
        multiple: false,
        noKeyboard: true,
    });

    return (
        <div className="fileupload-group">
            <div className="fileupload-label">Choose text file with 1 column of numbers</div>
            <div
                {...getRootProps()}
                className={`dropzone ${isDragActive ? 'active' : ''}`}
            >
                <input {...getInputProps()} data-testid="file-input" />
                <Icon path={mdiFileUploadOutline} size={1.3} />
                {isDragActive ?
                    (<p>Drop the file here...</p>) :
                    (<p>Drag & drop a .csv / .txt file or click to select</p>)
                }
                {reading && (
                    <div className="d-flex align-items-center justify-content-center">
                        <Spinner animation="border" role="status" size="sm" className="me-2">
                            <span className="visually-hidden">Reading...</span>
                        </Spinner>
                        <small>Reading file...</small>
                    </div>
                )}
                {currentFileName && !isDragActive && !reading && (
                    <div className="loaded-file-info text-success d-block mt-2">
                        <Icon path={mdiCheckCircleOutline} size={0.8} className="me-1"/>
                        <small>
                            Loaded: {currentFileName}
                        </small>
                    </div>
                )}
            </div>
        </div>
    );
}

export default FileUpload;
