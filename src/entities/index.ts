import { Employee } from './Employee';
import { CallLog } from './CallLog';
import { AttendanceConfig } from './AttendanceConfig';
import { AttendanceRecord } from './AttendanceRecord';
import { AuditEntry } from './AuditEntry';
import { Holiday } from './Holiday';
import { EmployeePermission } from './EmployeePermission';
import { ExpenseCategory } from './ExpenseCategory';
import { Expense } from './Expense';
import { ReimbursementRequest } from './ReimbursementRequest';

export const entities = [
  Employee,
  CallLog,
  AttendanceConfig,
  AttendanceRecord,
  AuditEntry,
  Holiday,
  EmployeePermission,
  ExpenseCategory,
  Expense,
  ReimbursementRequest,
];

export {
  Employee,
  CallLog,
  AttendanceConfig,
  AttendanceRecord,
  AuditEntry,
  Holiday,
  EmployeePermission,
  ExpenseCategory,
  Expense,
  ReimbursementRequest,
};
