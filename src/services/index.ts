import type { AppConfig } from '../config';
import { JsonStore } from '../storage/jsonStore';
import { AttendanceService } from './attendanceService';
import type { ServiceContext } from './context';
import { DepartmentService } from './departmentService';
import { DistrictService } from './districtService';
import { EmployeeService } from './employeeService';
import { StatisticsService } from './statisticsService';

export type Services = {
  store: JsonStore;
  districts: DistrictService;
  departments: DepartmentService;
  employees: EmployeeService;
  attendance: AttendanceService;
  statistics: StatisticsService;
};

export function createServices(config: Pick<AppConfig, 'dataDir'>, now: () => Date = () => new Date()): Services {
  const ctx: ServiceContext = { store: new JsonStore(config.dataDir), now };
  return {
    store: ctx.store,
    districts: new DistrictService(ctx),
    departments: new DepartmentService(ctx),
    employees: new EmployeeService(ctx),
    attendance: new AttendanceService(ctx),
    statistics: new StatisticsService(ctx),
  };
}
