import { DataSource } from 'typeorm';
import { config } from './config';
import { Employee } from './entities/Employee';
import { createLogger } from './logger';
import type { Services } from './services';
import { ADMIN_EMPLOYEE_ID } from './types';

const log = createLogger('bootstrap');

/** Start-up data every environment needs: the admin directory row and a first threshold version. */
export async function bootstrap(dataSource: DataSource, services: Services): Promise<void> {
  const repo = dataSource.getRepository(Employee);
  if (!(await repo.existsBy({ id: ADMIN_EMPLOYEE_ID }))) {
    await repo.insert({
      id: ADMIN_EMPLOYEE_ID,
      name: 'Admin User',
      email: null,
      department: null,
      jobPosition: null,
      appRole: 'admin',
      isActive: true,
      passwordHash: null,
    });
    log.info(`Admin user inserted: ${ADMIN_EMPLOYEE_ID}`);
  }
  await services.thresholds.ensureActive(config.attendance.defaultThresholds);
}
