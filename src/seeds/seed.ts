import { z } from 'zod';
import { attendanceSchema, departmentSchema, districtSchema, employeeSchema } from '../schemas';
import type { JsonStore } from '../storage/jsonStore';
import type { CollectionName } from '../types';
import { addDays, formatDate } from '../utils/date';
import seedFile from './data.json';

// Attendance dates are stored relative to startup: 0 is today, -1 yesterday.
const seedSchema = z.object({
  districts: z.array(districtSchema),
  departments: z.array(departmentSchema),
  employees: z.array(employeeSchema),
  attendance: z.array(attendanceSchema.omit({ date: true }).extend({ dayOffset: z.number().int() })),
});

export type SeedData = z.infer<typeof seedSchema>;

export function loadSeedData(): SeedData {
  return seedSchema.parse(seedFile);
}

/**
 * Writes the example dataset into every collection whose file does not
 * exist yet. Existing files are never touched.
 */
export async function seedCollections(
  store: JsonStore,
  now: Date = new Date(),
  seed: SeedData = loadSeedData(),
): Promise<CollectionName[]> {
  const seeded: CollectionName[] = [];

  const districts = store.collection('districts');
  if (!(await districts.exists())) {
    await districts.save(seed.districts);
    seeded.push('districts');
  }

  const departments = store.collection('departments');
  if (!(await departments.exists())) {
    await departments.save(seed.departments);
    seeded.push('departments');
  }

  const employees = store.collection('employees');
  if (!(await employees.exists())) {
    await employees.save(seed.employees);
    seeded.push('employees');
  }

  const attendance = store.collection('attendance');
  if (!(await attendance.exists())) {
    await attendance.save(
      seed.attendance.map(({ dayOffset, ...record }) => ({
        ...record,
        date: formatDate(addDays(now, dayOffset)),
      })),
    );
    seeded.push('attendance');
  }

  for (const name of seeded) console.log(`Seeded ${name}`);
  return seeded;
}
