import { afterAll, beforeAll, describe, expect, it } from '@jest/globals';
import type { Express } from 'express';
import request from 'supertest';
import * as XLSX from 'xlsx';
import { createApp } from '../src/app';
import { TEMPLATE_HEADERS } from '../src/services/callLogImport';
import { TestContext, addEmployee, createTestContext } from './helpers/fixtures';

const MONDAY = '2026-10-12';

describe('HTTP API', () => {
  let ctx: TestContext;
  let app: Express;
  let adminToken: string;

  const login = async (username: string, password: string) => {
    const res = await request(app).post('/api/auth/login').send({ username, password });
    expect(res.status).toBe(200);
    return String(res.body.token);
  };

  beforeAll(async () => {
    ctx = await createTestContext();
    await addEmployee(ctx.dataSource, 'E1');
    app = createApp(ctx.dataSource, ctx.services);
    adminToken = await login('admin', 'test-admin-password');
  });

  afterAll(async () => {
    await ctx.dataSource.destroy();
  });

  it('reports health without a token', async () => {
    const res = await request(app).get('/health');
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ ok: true, database: true });
  });

  it('rejects requests without a bearer token', async () => {
    const res = await request(app).get('/api/attendance');
    expect(res.status).toBe(401);
    expect(res.body).toEqual({ message: 'Missing token', code: 'AUTHENTICATION_ERROR' });
  });

  it('rejects a wrong admin password', async () => {
    const res = await request(app).post('/api/auth/login').send({ username: 'admin', password: 'nope' });
    expect(res.status).toBe(401);
    expect(res.body.code).toBe('AUTHENTICATION_ERROR');
  });

  it('ingests call logs and calculates attendance', async () => {
    const bulk = await request(app)
      .post('/api/call-logs/bulk')
      .set('Authorization', `Bearer ${adminToken}`)
      .send({ entries: [{ employeeId: 'E1', date: MONDAY, durationMinutes: 171, callCount: 12 }], source: 'DIALER' });
    expect(bulk.status).toBe(200);
    expect(bulk.body).toEqual({ created: 1, updated: 0, failed: 0, errors: [] });

    const run = await request(app)
      .post('/api/attendance/calculate')
      .set('Authorization', `Bearer ${adminToken}`)
      .send({ date: MONDAY });
    expect(run.status).toBe(200);
    expect(run.body).toMatchObject({ date: MONDAY, workingDay: true, created: 1 });

    const rows = await request(app)
      .get('/api/attendance')
      .query({ employeeId: 'E1', from: MONDAY, to: MONDAY })
      .set('Authorization', `Bearer ${adminToken}`);
    expect(rows.status).toBe(200);
    expect(rows.body).toHaveLength(1);
    expect(rows.body[0]).toMatchObject({ employeeId: 'E1', status: 'PRESENT', source: 'AUTO', minutes: 171 });
  });

  it('refuses to calculate more than a year at once', async () => {
    const res = await request(app)
      .post('/api/attendance/calculate')
      .set('Authorization', `Bearer ${adminToken}`)
      .send({ from: '2024-01-01', to: '2026-10-12' });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({
      message: 'A calculation covers at most 366 days',
      code: 'VALIDATION_ERROR',
      details: [{ path: 'to', message: 'A calculation covers at most 366 days' }],
    });
  });

  it('rejects a reversed date range on every range query', async () => {
    const reversed = { message: 'from must not be after to', code: 'VALIDATION_ERROR', details: [{ path: 'to', message: 'from must not be after to' }] };
    const holidays = await request(app)
      .get('/api/holidays')
      .query({ from: '2026-12-31', to: '2026-01-01' })
      .set('Authorization', `Bearer ${adminToken}`);
    expect(holidays.status).toBe(400);
    expect(holidays.body).toEqual(reversed);

    const records = await request(app)
      .get('/api/attendance')
      .query({ employeeId: 'E1', from: '2026-10-13', to: MONDAY })
      .set('Authorization', `Bearer ${adminToken}`);
    expect(records.status).toBe(400);
    expect(records.body).toEqual(reversed);
  });

  it('imports a CSV upload', async () => {
    const res = await request(app)
      .post('/api/call-logs/import')
      .set('Authorization', `Bearer ${adminToken}`)
      .set('Content-Type', 'text/csv')
      .send('employee_id,date,duration_minutes\nE1,2026-10-13,125\n');
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ created: 1, updated: 0, failed: 0, errors: [] });
  });

  it('serves the upload template as xlsx', async () => {
    const res = await request(app)
      .get('/api/call-logs/template')
      .set('Authorization', `Bearer ${adminToken}`)
      .responseType('blob');

    expect(res.status).toBe(200);
    expect(res.headers['content-disposition']).toBe('attachment; filename="call-log-template.xlsx"');
    expect(Buffer.isBuffer(res.body)).toBe(true);
    const book = XLSX.read(res.body, { type: 'buffer' });
    expect(XLSX.utils.sheet_to_json<string[]>(book.Sheets['Call logs'], { header: 1 })[0]).toEqual(TEMPLATE_HEADERS);
  });

  it('assigns permissions in bulk and reports unknown employees', async () => {
    await addEmployee(ctx.dataSource, 'E7');

    const res = await request(app)
      .post('/api/permissions/bulk')
      .set('Authorization', `Bearer ${adminToken}`)
      .send({ employeeIds: ['E7', 'MISSING'], groups: ['attendance-supervisors'] });

    expect(res.status).toBe(207);
    expect(res.body).toEqual({
      succeeded: 1,
      failed: 1,
      results: [
        {
          employeeId: 'E7',
          ok: true,
          permissions: ['attendance.ingest', 'attendance.override', 'attendance.view_all', 'attendance.view_audit'],
        },
        { employeeId: 'MISSING', ok: false, kind: 'NOT_FOUND', message: 'Employee MISSING not found' },
      ],
    });
  });

  it('rejects a bulk assignment without employees', async () => {
    const res = await request(app)
      .post('/api/permissions/bulk')
      .set('Authorization', `Bearer ${adminToken}`)
      .send({ employeeIds: [], permissions: ['attendance.view_all'] });

    expect(res.status).toBe(400);
    expect(res.body.message).toBe('Name at least one employee');
  });

  it('answers validation failures with 400 and details', async () => {
    const res = await request(app)
      .post('/api/attendance/override')
      .set('Authorization', `Bearer ${adminToken}`)
      .send({ employeeId: 'E1', date: MONDAY, status: 'PRESENT', reason: 'too short' });
    expect(res.status).toBe(400);
    expect(res.body).toEqual({
      message: 'Reason must be at least 10 characters',
      code: 'VALIDATION_ERROR',
      details: [{ path: 'reason', message: 'Reason must be at least 10 characters' }],
    });
  });

  it('lets an employee log in, read their attendance and nothing more', async () => {
    const created = await request(app)
      .post('/api/employees')
      .set('Authorization', `Bearer ${adminToken}`)
      .send({ id: 'E5', name: 'Field Agent', password: 'field-agent-pw' });
    expect(created.status).toBe(201);
    expect(created.body).not.toHaveProperty('passwordHash');

    const token = await login('E5', 'field-agent-pw');

    const own = await request(app)
      .get('/api/attendance')
      .query({ from: '2026-10-01', to: '2026-10-31' })
      .set('Authorization', `Bearer ${token}`);
    expect(own.status).toBe(200);
    expect(own.body).toEqual([]);

    const override = await request(app)
      .post('/api/attendance/override')
      .set('Authorization', `Bearer ${token}`)
      .send({ employeeId: 'E1', date: MONDAY, status: 'ABSENT', reason: 'should not be allowed' });
    expect(override.status).toBe(403);
    expect(override.body).toEqual({ message: 'Missing permission attendance.override', code: 'AUTHORIZATION_ERROR' });
  });

  it('answers unknown routes with 404', async () => {
    const res = await request(app).get('/api/nothing-here');
    expect(res.status).toBe(404);
    expect(res.body.code).toBe('NOT_FOUND');
  });
});
