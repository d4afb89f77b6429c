import { Router, Request, Response, NextFunction } from 'express';
import { logger } from '../logger';
import { parseGradebookRequest } from '../middleware/validation';
import { runGradebook } from '../services/gradebookService';
import { binScores, gradeHistogram, scoreDistribution, summarize } from '../services/reportService';
import { partitionBySection } from '../services/exportService';

export const gradebookRouter = Router();

// POST /api/v1/gradebook — Merge, score and summarize one dataset
gradebookRouter.post('/', (req: Request, res: Response, next: NextFunction) => {
  try {
    const input = parseGradebookRequest(req.body);
    const { table, schema } = runGradebook(input);
    const values = scoreDistribution(table);

    logger.info({
      module: 'routes.gradebook',
      student_count: table.rows.size,
      quiz_count: input.quizzes?.length ?? 0,
    }, 'Gradebook generated');

    res.json({
      data: {
        index: table.indexName,
        columns: table.columns,
        schema,
        students: [...table.rows].map(([id, row]) => ({ id, ...row })),
        summary: summarize(table),
        histogram: gradeHistogram(table),
        distribution: { values, bins: binScores(values) },
        sections: [...partitionBySection(table).keys()],
      },
    });
  } catch (err) {
    next(err);
  }
});
