import type { z } from 'zod';
import type {
  createDepartmentSchema,
  createDistrictSchema,
  createEmployeeSchema,
  departmentSchema,
  districtSchema,
  employeeSchema,
  updateDepartmentSchema,
  updateDistrictSchema,
  updateEmployeeSchema,
  upsertAttendanceSchema,
} from './schemas';

export type District = z.infer<typeof districtSchema>;

export type Department = z.infer<typeof departmentSchema>;

export type Employee = z.infer<typeof employeeSchema>;

export type AttendanceRecord = {
  id: string;
  employeeName: string;
  employeeId: string;
  department: string;
  date: string; // YYYY-MM-DD
  checkIn: string | null; // HH:MM
  checkOut: string | null;
  status: 'present' | 'late' | 'absent' | 'early-leave' | string;
  workHours: string; // H:MM
  location: Record<string, unknown> | null;
};

export type CollectionMap = {
  districts: District;
  departments: Department;
  employees: Employee;
  attendance: AttendanceRecord;
};

export type CollectionName = keyof CollectionMap;

export type CreateDistrictInput = z.input<typeof createDistrictSchema>;
export type DistrictPatch = z.infer<typeof updateDistrictSchema>;

export type CreateDepartmentInput = z.input<typeof createDepartmentSchema>;
export type DepartmentPatch = z.infer<typeof updateDepartmentSchema>;

export type CreateEmployeeInput = z.input<typeof createEmployeeSchema>;
export type EmployeePatch = z.infer<typeof updateEmployeeSchema>;

export type UpsertAttendanceInput = z.infer<typeof upsertAttendanceSchema>;

export type ApiResponse<T> = {
  success: boolean;
  data: T;
  message?: string;
};

export type ChartPoint = { name: string; present: number; absent: number; late: number };

export type DepartmentSlice = { name: string; value: number; color: string; districtId: string };

export type PerformancePoint = { month: string; efficiency: number; satisfaction: number };

export type Insight = { type: 'positive' | 'warning' | 'info'; title: string; description: string };

export type Trend = { current: number; change: number };

export type Statistics = {
  overview: {
    totalEmployees: number;
    activeEmployees: number;
    totalDepartments: number;
    totalDistricts: number;
  };
  attendance: {
    total: number;
    present: number;
    absent: number;
    late: number;
    percentage: number;
  };
  trends: {
    attendance: Trend;
    late: Trend;
    efficiency: Trend;
    satisfaction: Trend;
  };
  attendanceData: ChartPoint[];
  departmentData: DepartmentSlice[];
  performanceData: PerformancePoint[];
  insights: Insight[];
};
