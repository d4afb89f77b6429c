import { Router, Request, Response, NextFunction } from 'express';
import { logger } from '../logger';
import { parseGradebookRequest } from '../middleware/validation';
import { runGradebook } from '../services/gradebookService';
import { FULL_EXPORT_FILE, generateCSV, generateSectionCSV, generateSectionCSVs, sectionFileName } from '../services/exportService';
import { studentReport } from '../services/reportService';

export const exportRouter = Router();

// POST /api/v1/gradebook/export?section=<name>
exportRouter.post('/gradebook/export', (req: Request, res: Response, next: NextFunction) => {
  try {
    const section = typeof req.query.section === 'string' ? req.query.section : undefined;
    logger.info({ module: 'routes.export', section: section ?? null }, 'Export requested');

    const { table } = runGradebook(parseGradebookRequest(req.body));
    const csv = section === undefined ? generateCSV(table) : generateSectionCSV(table, section);
    const fileName = section === undefined ? FULL_EXPORT_FILE : sectionFileName(section);

    // attachment() encodes names outside Latin-1 as filename*
    res.attachment(fileName);
    return res.send(csv);
  } catch (err) {
    next(err);
  }
});

// POST /api/v1/gradebook/export/sections
exportRouter.post('/gradebook/export/sections', (req: Request, res: Response, next: NextFunction) => {
  try {
    const { table } = runGradebook(parseGradebookRequest(req.body));
    const data = generateSectionCSVs(table);
    res.json({ data });
  } catch (err) {
    next(err);
  }
});

// POST /api/v1/gradebook/students/:id/report?format=json|txt
exportRouter.post('/gradebook/students/:id/report', (req: Request, res: Response, next: NextFunction) => {
  try {
    const studentId = req.params.id;
    const format = typeof req.query.format === 'string' ? req.query.format : 'json';
    logger.info({ module: 'routes.export', student_id: studentId, format }, 'Report requested');

    const { table } = runGradebook(parseGradebookRequest(req.body));
    const report = studentReport(table, studentId);

    if (format === 'txt') {
      res.attachment(report.file_name);
      return res.send(report.text);
    }
    res.json({ data: report });
  } catch (err) {
    next(err);
  }
});
