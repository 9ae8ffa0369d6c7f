import express from 'express';
import type { Express } from 'express';
import cors from 'cors';
import type { AppConfig } from './config';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { rejectSuspiciousAgents, requestLogger } from './middleware/requestFilter';
import attendanceRouter from './routes/attendance';
import departmentsRouter from './routes/departments';
import districtsRouter from './routes/districts';
import employeesRouter from './routes/employees';
import healthRouter from './routes/health';
import statisticsRouter from './routes/statistics';
import type { Services } from './services';

export function createApp(config: AppConfig, services: Services): Express {
  const app = express();

  // CORS first so that rejections from the agent gate still carry its headers.
  app.use(cors({
    origin: config.corsOrigins,
    credentials: true,
    methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
    exposedHeaders: ['Access-Control-Allow-Origin'],
  }));
  if (config.logRequests) app.use(requestLogger);
  app.use(rejectSuspiciousAgents);
  app.use(express.json());

  app.use('/districts', districtsRouter(services.districts));
  app.use('/departments', departmentsRouter(services.departments));
  app.use('/employees', employeesRouter(services.employees));
  app.use('/attendance', attendanceRouter(services.attendance));
  app.use('/statistics', statisticsRouter(services.statistics));
  app.use('/', healthRouter(config.version));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
