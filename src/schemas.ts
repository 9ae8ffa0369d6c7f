import { z } from 'zod';

const locationSchema = z.record(z.unknown());

export const districtSchema = z.object({
  id: z.string(),
  name: z.string(),
  code: z.string(),
  description: z.string(),
  createdAt: z.string(),
});

export const departmentSchema = z.object({
  id: z.string(),
  name: z.string(),
  departmentNumber: z.string(),
  districtId: z.string(),
  districtName: z.string(),
  manager: z.string(),
  employeeCount: z.number().int(),
  description: z.string(),
  createdAt: z.string(),
});

export const employeeSchema = z.object({
  id: z.string(),
  name: z.string(),
  phone: z.string(),
  photo: z.string(),
  position: z.string(),
  departmentId: z.string(),
  departmentName: z.string(),
  departmentNumber: z.string(),
  districtName: z.string(),
  email: z.string(),
  status: z.string(),
  createdAt: z.string(),
});

export const attendanceSchema = z.object({
  id: z.string(),
  employeeName: z.string(),
  employeeId: z.string(),
  department: z.string(),
  date: z.string(),
  checkIn: z.string().nullable(),
  checkOut: z.string().nullable(),
  status: z.string(),
  workHours: z.string(),
  location: locationSchema.nullable(),
});

// Stored records are read leniently: null or missing fields take their
// create default, numbers in text fields become strings, and keys this
// service does not know about are carried through to the next save.
const text = (fallback = '') =>
  z.preprocess((v) => (v == null ? fallback : typeof v === 'number' ? String(v) : v), z.string());

const optionalText = () =>
  z.preprocess((v) => (v === undefined ? null : typeof v === 'number' ? String(v) : v), z.string().nullable());

const count = () =>
  z.preprocess(
    (v) => (v == null ? 0 : typeof v === 'string' && v.trim() !== '' ? Number(v) : v),
    z.number().int(),
  );

export const storedDistrictSchema = z
  .object({
    id: text(),
    name: text(),
    code: text(),
    description: text(),
    createdAt: text(),
  })
  .passthrough();

export const storedDepartmentSchema = z
  .object({
    id: text(),
    name: text(),
    departmentNumber: text(),
    districtId: text(),
    districtName: text(),
    manager: text(),
    employeeCount: count(),
    description: text(),
    createdAt: text(),
  })
  .passthrough();

export const storedEmployeeSchema = z
  .object({
    id: text(),
    name: text(),
    phone: text(),
    photo: text(),
    position: text(),
    departmentId: text(),
    departmentName: text(),
    departmentNumber: text(),
    districtName: text(),
    email: text(),
    status: text('active'),
    createdAt: text(),
  })
  .passthrough();

export const storedAttendanceSchema = z
  .object({
    id: text(),
    employeeName: text(),
    employeeId: text(),
    department: text(),
    date: text(),
    checkIn: optionalText(),
    checkOut: optionalText(),
    status: text('absent'),
    workHours: text('0:00'),
    location: locationSchema.nullish().transform((v) => v ?? null),
  })
  .passthrough();

// Request bodies
export const createDistrictSchema = z.object({
  name: z.string().min(1),
  code: z.string().min(1),
  description: z.string().default(''),
});

export const updateDistrictSchema = districtSchema
  .omit({ id: true, createdAt: true })
  .partial();

export const createDepartmentSchema = z.object({
  name: z.string().min(1),
  departmentNumber: z.string().min(1),
  districtId: z.string().min(1),
  manager: z.string(),
  description: z.string().default(''),
});

export const updateDepartmentSchema = departmentSchema
  .omit({ id: true, createdAt: true })
  .partial();

export const createEmployeeSchema = z.object({
  name: z.string().min(1),
  phone: z.string().min(1),
  position: z.string(),
  departmentId: z.string().min(1),
  email: z.string().default(''),
  photo: z.string().default(''),
  status: z.string().default('active'),
});

export const updateEmployeeSchema = employeeSchema
  .omit({ id: true, createdAt: true })
  .partial();

export const upsertAttendanceSchema = z.object({
  employeeId: z.string().min(1),
  date: z.string().min(1),
  checkIn: z.string().nullable().optional(),
  checkOut: z.string().nullable().optional(),
  status: z.string().min(1),
  location: locationSchema.nullable().optional(),
});

export const attendanceQuerySchema = z.object({
  date: z.string({ required_error: 'date query parameter is required' }).min(1),
});

export const statisticsQuerySchema = z.object({
  period: z.string().default('monthly'),
});
