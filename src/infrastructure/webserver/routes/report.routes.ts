// src/infrastructure/webserver/routes/report.routes.ts
import { Router } from 'express';
import { container } from 'tsyringe';
import { ReportController } from '../controllers/report.controller';
import { uploadReportExtracts } from '../middleware/upload.middleware';

/**
 * Builds the /api/reports router. Resolved lazily so the controller is
 * taken from the container after registerDependencies() has run.
 */
export function createReportRouter(): Router {
    const router = Router();
    const reportController = container.resolve(ReportController);

    // POST /api/reports - Upload the four extracts, receive the visit report CSV
    router.post('/', uploadReportExtracts, reportController.handleVisitReport);

    // POST /api/reports/counter-summary - Same upload, per-counter visit counts as CSV
    router.post('/counter-summary', uploadReportExtracts, reportController.handleCounterSummary);

    // POST /api/reports/workbook - Same upload, visits and summary as an Excel workbook
    router.post('/workbook', uploadReportExtracts, reportController.handleWorkbook);

    return router;
}
