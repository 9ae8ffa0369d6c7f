import { z } from 'zod';
import type { DepartmentSlice, Statistics } from '../types';
import { formatDate } from '../utils/date';
import { roundHalfEven } from '../utils/rounding';
import type { ServiceContext } from './context';
import placeholderData from './statisticsPlaceholders.json';

export const DEPARTMENT_COLORS = ['#8b5cf6', '#06b6d4', '#10b981', '#f59e0b', '#ef4444', '#8b5a2b'];

const trendSchema = z.object({ current: z.number(), change: z.number() });

const placeholdersSchema = z.object({
  attendanceData: z.array(
    z.object({ name: z.string(), present: z.number(), absent: z.number(), late: z.number() }),
  ),
  performanceData: z.array(
    z.object({ month: z.string(), efficiency: z.number(), satisfaction: z.number() }),
  ),
  trends: z.object({
    attendanceChange: z.number(),
    lateChange: z.number(),
    efficiency: trendSchema,
    satisfaction: trendSchema,
  }),
  insights: z.array(
    z.object({
      type: z.enum(['positive', 'warning', 'info']),
      title: z.string(),
      description: z.string(),
    }),
  ),
});

// Illustrative chart series and insights; not derived from stored data.
const placeholders = placeholdersSchema.parse(placeholderData);

// Records left behind by deleted employees can outnumber the head count.
function percent(part: number, total: number) {
  if (total <= 0) return 0;
  return roundHalfEven(Math.min(100, (part / total) * 100), 1);
}

export class StatisticsService {
  constructor(private readonly ctx: ServiceContext) {}

  /** `period` is accepted for forward compatibility and does not change the result. */
  async getStatistics(_period = 'monthly'): Promise<Statistics> {
    const { store } = this.ctx;
    const employees = await store.collection('employees').load();
    const departments = await store.collection('departments').load();
    const districts = await store.collection('districts').load();
    const records = await store.collection('attendance').load();

    const totalEmployees = employees.length;
    const today = formatDate(this.ctx.now());
    const todays = records.filter((r) => r.date === today);
    const countStatus = (status: string) => todays.filter((r) => r.status === status).length;

    const present = countStatus('present');
    const late = countStatus('late');
    const absent = countStatus('absent');

    const attendancePercentage = percent(present + late, totalEmployees);
    const latePercentage = percent(late, totalEmployees);

    const departmentData: DepartmentSlice[] = departments.map((dept, i) => ({
      name: dept.name,
      value: dept.employeeCount,
      color: DEPARTMENT_COLORS[i % DEPARTMENT_COLORS.length],
      districtId: dept.districtId,
    }));

    return {
      overview: {
        totalEmployees,
        activeEmployees: employees.filter((emp) => emp.status === 'active').length,
        totalDepartments: departments.length,
        totalDistricts: districts.length,
      },
      attendance: {
        total: totalEmployees,
        present,
        absent,
        late,
        percentage: attendancePercentage,
      },
      trends: {
        attendance: { current: attendancePercentage, change: placeholders.trends.attendanceChange },
        late: { current: latePercentage, change: placeholders.trends.lateChange },
        efficiency: { ...placeholders.trends.efficiency },
        satisfaction: { ...placeholders.trends.satisfaction },
      },
      attendanceData: placeholders.attendanceData.map((point) => ({ ...point })),
      departmentData,
      performanceData: placeholders.performanceData.map((point) => ({ ...point })),
      insights: placeholders.insights.map((insight) => ({ ...insight })),
    };
  }
}
