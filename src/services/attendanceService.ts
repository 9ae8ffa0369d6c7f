import { v4 as uuidv4 } from 'uuid';
import { NotFoundError } from '../errors';
import type { AttendanceRecord, UpsertAttendanceInput } from '../types';
import { calculateWorkHours } from '../utils/workHours';
import type { ServiceContext } from './context';

export class AttendanceService {
  constructor(private readonly ctx: ServiceContext) {}

  private get attendance() {
    return this.ctx.store.collection('attendance');
  }

  /** Exact string match on the stored date; no parsing or normalization. */
  async listByDate(date: string): Promise<AttendanceRecord[]> {
    const records = await this.attendance.load();
    return records.filter((r) => r.date === date);
  }

  /** Keeps a single record per (employeeId, date), overwriting its times, status and location. */
  async upsert(input: UpsertAttendanceInput): Promise<AttendanceRecord> {
    const employees = await this.ctx.store.collection('employees').load();
    const employee = employees.find((emp) => emp.id === input.employeeId);
    if (!employee) throw new NotFoundError('Employee not found');

    const records = await this.attendance.load();
    const checkIn = input.checkIn ?? null;
    const checkOut = input.checkOut ?? null;
    const workHours = calculateWorkHours(checkIn, checkOut);

    let record = records.find((r) => r.employeeId === input.employeeId && r.date === input.date);
    if (record) {
      record.checkIn = checkIn;
      record.checkOut = checkOut;
      record.status = input.status;
      record.location = input.location ?? null;
      record.workHours = workHours;
    } else {
      record = {
        id: uuidv4(),
        employeeName: employee.name,
        employeeId: input.employeeId,
        department: employee.departmentName,
        date: input.date,
        checkIn,
        checkOut,
        status: input.status,
        workHours,
        location: input.location ?? null,
      };
      records.push(record);
    }

    await this.attendance.save(records);
    return record;
  }
}
