import { Between, DataSource } from 'typeorm';
import { v4 as uuidv4 } from 'uuid';
import { Holiday } from '../entities/Holiday';
import { ConflictError, NotFoundError, isUniqueViolation } from '../errors';
import type { Actor } from '../types';
import { DateKey, dayOfWeek } from '../utils/dates';
import type { PermissionService } from './permissionService';

export interface WorkingDayCalendar {
  isWorkingDay(date: DateKey): Promise<boolean>;
}

/** Working days: not a weekly off day and not in the holiday table. */
export class CalendarService implements WorkingDayCalendar {
  private readonly weeklyOffDays: ReadonlySet<number>;

  constructor(
    private readonly dataSource: DataSource,
    private readonly permissions: PermissionService,
    weeklyOffDays: readonly number[],
  ) {
    this.weeklyOffDays = new Set(weeklyOffDays);
  }

  private get holidays() {
    return this.dataSource.getRepository(Holiday);
  }

  isWeeklyOff(date: DateKey): boolean {
    return this.weeklyOffDays.has(dayOfWeek(date));
  }

  async isWorkingDay(date: DateKey): Promise<boolean> {
    if (this.isWeeklyOff(date)) return false;
    return !(await this.holidays.existsBy({ date }));
  }

  async listHolidays(from: DateKey, to: DateKey): Promise<Holiday[]> {
    return this.holidays.find({ where: { date: Between(from, to) }, order: { date: 'ASC' } });
  }

  async addHoliday(actor: Actor, date: DateKey, name: string): Promise<Holiday> {
    await this.permissions.authorize(actor, 'calendar.manage');
    const holiday = this.holidays.create({ id: uuidv4(), date, name });
    try {
      await this.holidays.insert(holiday);
    } catch (err) {
      if (isUniqueViolation(err)) throw new ConflictError(`A holiday already exists on ${date}`);
      throw err;
    }
    return holiday;
  }

  async removeHoliday(actor: Actor, id: string): Promise<void> {
    await this.permissions.authorize(actor, 'calendar.manage');
    const result = await this.holidays.delete({ id });
    if (!result.affected) throw new NotFoundError(`Holiday ${id} not found`);
  }
}
