import { Router } from 'express';
import { gradebookRouter } from './gradebook';
import { exportRouter } from './export';

export const apiRouter = Router();

// Export router first: its /gradebook/... paths sit under the gradebook mount
apiRouter.use('/', exportRouter);
apiRouter.use('/gradebook', gradebookRouter);
