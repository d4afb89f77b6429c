import { WeightConfig } from './types';

const NODE_ENV = process.env.NODE_ENV || 'development';

export const config = {
  nodeEnv: NODE_ENV,
  port: parseInt(process.env.PORT || '8000', 10),
  corsOrigin: process.env.CORS_ORIGIN || 'http://localhost:3000',
  bodyLimit: process.env.BODY_LIMIT || '10mb',
  logLevel: process.env.LOG_LEVEL || (NODE_ENV === 'test' ? 'silent' : 'info'),
};

// Sidebar defaults of the grading dashboard
export const DEFAULT_WEIGHTS: WeightConfig = {
  'Exam 1 Score': 0.05,
  'Exam 2 Score': 0.10,
  'Exam 3 Score': 0.15,
  'Quiz Score': 0.30,
  'Homework Score': 0.40,
};

export const WEIGHT_SUM_TOLERANCE = 1e-6;
