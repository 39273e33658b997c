import cors from 'cors';
import express from 'express';
import { DataSource } from 'typeorm';
import { config } from './config';
import { errorHandler, notFound } from './middleware/errorHandler';
import attendanceRouter from './routes/attendance';
import attendanceConfigRouter from './routes/attendanceConfig';
import authRouter from './routes/auth';
import callLogsRouter from './routes/callLogs';
import employeesRouter from './routes/employee';
import expenseCategoriesRouter from './routes/expenseCategories';
import expensesRouter from './routes/expenses';
import holidaysRouter from './routes/holidays';
import permissionsRouter from './routes/permissions';
import reimbursementsRouter from './routes/reimbursements';
import type { Services } from './services';

export function createApp(dataSource: DataSource, services: Services) {
  const app = express();
  app.use(cors({
    origin: config.frontendUrl,
    credentials: true,
  }));
  app.use(express.json({ limit: '2mb' }));

  app.get('/health', (_req, res) => {
    res.json({ ok: true, database: dataSource.isInitialized });
  });

  app.use('/api/auth', authRouter(dataSource, services.permissions));
  app.use('/api/employees', employeesRouter(dataSource));
  app.use('/api/call-logs', callLogsRouter(services));
  app.use('/api/attendance', attendanceRouter(services));
  app.use('/api/attendance-config', attendanceConfigRouter(services));
  app.use('/api/holidays', holidaysRouter(services));
  app.use('/api/permissions', permissionsRouter(services));
  app.use('/api/expenses', expensesRouter(services));
  app.use('/api/expense-categories', expenseCategoriesRouter(services));
  app.use('/api/reimbursements', reimbursementsRouter(services));

  app.use(notFound);
  app.use(errorHandler);
  return app;
}
