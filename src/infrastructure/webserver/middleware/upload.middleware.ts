// src/infrastructure/webserver/middleware/upload.middleware.ts
import { Request } from 'express';
import multer from 'multer';
import path from 'path';
import config from '../../../config';
import { ValidationError } from '../../../core/common/errors';

/** Multipart field of each extract a report run needs. */
export const REPORT_UPLOAD_FIELDS = ['plannedVisits', 'unplannedVisits', 'counters', 'users'] as const;
export type ReportUploadField = typeof REPORT_UPLOAD_FIELDS[number];

// Browsers disagree on the CSV mimetype; the extension decides, the mimetype only rules out the obvious
const ALLOWED_MIMES = [
    'text/csv',
    'text/plain',
    'application/csv',
    'application/vnd.ms-excel',
    'application/octet-stream',
];

// Memory storage: extracts are parsed and discarded within the request
const storage = multer.memoryStorage();

const fileFilter = (req: Request, file: Express.Multer.File, cb: multer.FileFilterCallback) => {
    const extension = path.extname(file.originalname).toLowerCase();
    if (extension === '.csv' && ALLOWED_MIMES.includes(file.mimetype)) {
        cb(null, true);
    } else {
        cb(new ValidationError(`Invalid file "${file.originalname}" (${file.mimetype}). Only .csv extracts are accepted.`));
    }
};

const upload = multer({
    storage: storage,
    fileFilter: fileFilter,
    limits: {
        fileSize: config.upload.maxFileSizeBytes,
        files: REPORT_UPLOAD_FIELDS.length,
    },
});

/**
 * Middleware accepting the four extracts of a report run, one file per field.
 */
export const uploadReportExtracts = upload.fields(
    REPORT_UPLOAD_FIELDS.map(name => ({ name, maxCount: 1 }))
);
