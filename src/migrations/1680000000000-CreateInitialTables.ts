import { MigrationInterface, QueryRunner } from "typeorm";

export class CreateInitialTables1680000000000 implements MigrationInterface {
  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS employees (
        id VARCHAR(64) PRIMARY KEY,
        name VARCHAR NOT NULL,
        email VARCHAR,
        department VARCHAR,
        job_position VARCHAR,
        app_role VARCHAR(16) NOT NULL DEFAULT 'employee',
        is_active BOOLEAN NOT NULL DEFAULT TRUE,
        password_hash VARCHAR,
        created_at TIMESTAMP NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMP NOT NULL DEFAULT NOW(),
        deleted_at TIMESTAMP
      );
    `);

    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS call_logs (
        id VARCHAR(36) PRIMARY KEY,
        employee_id VARCHAR(64) NOT NULL,
        date VARCHAR(10) NOT NULL,
        duration_minutes INTEGER NOT NULL,
        call_count INTEGER NOT NULL DEFAULT 0,
        source VARCHAR(50) NOT NULL DEFAULT 'MANUAL',
        created_at TIMESTAMP NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMP NOT NULL DEFAULT NOW()
      );
    `);
    await queryRunner.query(
      `CREATE UNIQUE INDEX IF NOT EXISTS idx_call_logs_employee_date_source ON call_logs(employee_id, date, source);`,
    );

    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS attendance_configs (
        id VARCHAR(36) PRIMARY KEY,
        version INTEGER NOT NULL,
        full_day_minutes INTEGER NOT NULL,
        half_day_minutes INTEGER NOT NULL,
        is_active BOOLEAN NOT NULL DEFAULT FALSE,
        created_by VARCHAR(64) NOT NULL,
        created_at TIMESTAMP NOT NULL DEFAULT NOW()
      );
    `);
    await queryRunner.query(`CREATE UNIQUE INDEX IF NOT EXISTS idx_attendance_configs_version ON attendance_configs(version);`);
    // at most one active row
    await queryRunner.query(
      `CREATE UNIQUE INDEX IF NOT EXISTS idx_attendance_configs_single_active ON attendance_configs(is_active) WHERE is_active;`,
    );

    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS attendance_records (
        id VARCHAR(36) PRIMARY KEY,
        employee_id VARCHAR(64) NOT NULL,
        date VARCHAR(10) NOT NULL,
        status VARCHAR(10) NOT NULL,
        minutes INTEGER NOT NULL,
        call_count INTEGER NOT NULL DEFAULT 0,
        source VARCHAR(10) NOT NULL,
        config_version INTEGER,
        reason TEXT,
        updated_by VARCHAR(64),
        created_at TIMESTAMP NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMP NOT NULL DEFAULT NOW()
      );
    `);
    await queryRunner.query(
      `CREATE UNIQUE INDEX IF NOT EXISTS idx_attendance_records_employee_date ON attendance_records(employee_id, date);`,
    );
    await queryRunner.query(`CREATE INDEX IF NOT EXISTS idx_attendance_records_date ON attendance_records(date);`);

    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS attendance_audit_entries (
        id VARCHAR(36) PRIMARY KEY,
        attendance_record_id VARCHAR(36) NOT NULL REFERENCES attendance_records(id),
        employee_id VARCHAR(64) NOT NULL,
        date VARCHAR(10) NOT NULL,
        action VARCHAR(10) NOT NULL,
        previous_status VARCHAR(10),
        new_status VARCHAR(10) NOT NULL,
        previous_minutes INTEGER,
        new_minutes INTEGER NOT NULL,
        previous_source VARCHAR(10),
        new_source VARCHAR(10) NOT NULL,
        reason TEXT NOT NULL,
        actor VARCHAR(64) NOT NULL,
        timestamp TIMESTAMP NOT NULL
      );
    `);
    await queryRunner.query(
      `CREATE INDEX IF NOT EXISTS idx_audit_record ON attendance_audit_entries(attendance_record_id);`,
    );
    await queryRunner.query(
      `CREATE INDEX IF NOT EXISTS idx_audit_employee_date ON attendance_audit_entries(employee_id, date);`,
    );
    await queryRunner.query(`CREATE INDEX IF NOT EXISTS idx_audit_timestamp ON attendance_audit_entries(timestamp);`);

    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS holidays (
        id VARCHAR(36) PRIMARY KEY,
        date VARCHAR(10) NOT NULL UNIQUE,
        name VARCHAR NOT NULL
      );
    `);

    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS employee_permissions (
        id VARCHAR(36) PRIMARY KEY,
        employee_id VARCHAR(64) NOT NULL,
        codename VARCHAR(64) NOT NULL,
        granted_by VARCHAR(64) NOT NULL,
        created_at TIMESTAMP NOT NULL DEFAULT NOW()
      );
    `);
    await queryRunner.query(
      `CREATE UNIQUE INDEX IF NOT EXISTS idx_employee_permissions_unique ON employee_permissions(employee_id, codename);`,
    );

    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS expense_categories (
        id VARCHAR(36) PRIMARY KEY,
        name VARCHAR(100) NOT NULL UNIQUE,
        description TEXT NOT NULL DEFAULT '',
        is_active BOOLEAN NOT NULL DEFAULT TRUE
      );
    `);

    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS reimbursement_requests (
        id VARCHAR(36) PRIMARY KEY,
        employee_id VARCHAR(64) NOT NULL,
        total_cents INTEGER NOT NULL,
        status VARCHAR(20) NOT NULL DEFAULT 'pending',
        notes TEXT NOT NULL DEFAULT '',
        approved_by VARCHAR(64),
        approved_at TIMESTAMP,
        created_at TIMESTAMP NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMP NOT NULL DEFAULT NOW()
      );
    `);

    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS expenses (
        id VARCHAR(36) PRIMARY KEY,
        employee_id VARCHAR(64) NOT NULL,
        category_id VARCHAR(36) NOT NULL REFERENCES expense_categories(id),
        title VARCHAR(200) NOT NULL,
        description TEXT NOT NULL DEFAULT '',
        amount_cents INTEGER NOT NULL,
        expense_date VARCHAR(10) NOT NULL,
        receipt_url VARCHAR,
        status VARCHAR(20) NOT NULL DEFAULT 'draft',
        approved_by VARCHAR(64),
        approved_at TIMESTAMP,
        rejection_reason TEXT,
        reimbursement_id VARCHAR(36) REFERENCES reimbursement_requests(id),
        created_at TIMESTAMP NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMP NOT NULL DEFAULT NOW()
      );
    `);
    await queryRunner.query(`CREATE INDEX IF NOT EXISTS idx_expenses_employee_status ON expenses(employee_id, status);`);
    await queryRunner.query(`CREATE INDEX IF NOT EXISTS idx_expenses_reimbursement ON expenses(reimbursement_id);`);
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP TABLE IF EXISTS expenses;`);
    await queryRunner.query(`DROP TABLE IF EXISTS reimbursement_requests;`);
    await queryRunner.query(`DROP TABLE IF EXISTS expense_categories;`);
    await queryRunner.query(`DROP TABLE IF EXISTS employee_permissions;`);
    await queryRunner.query(`DROP TABLE IF EXISTS holidays;`);
    await queryRunner.query(`DROP TABLE IF EXISTS attendance_audit_entries;`);
    await queryRunner.query(`DROP TABLE IF EXISTS attendance_records;`);
    await queryRunner.query(`DROP TABLE IF EXISTS attendance_configs;`);
    await queryRunner.query(`DROP TABLE IF EXISTS call_logs;`);
    await queryRunner.query(`DROP TABLE IF EXISTS employees;`);
  }
}
