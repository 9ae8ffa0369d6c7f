import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { seedCollections } from '../seeds/seed';
import { FIXED_NOW, TODAY, makeDataDir, removeDataDir, testServices } from '../test/helpers';
import { createServices } from './index';
import type { Services } from './index';

describe('StatisticsService', () => {
  let dir: string;
  let services: Services;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    dir = await makeDataDir();
    services = testServices(dir);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeDataDir(dir);
  });

  it('summarizes the seeded organization for today', async () => {
    await seedCollections(services.store, FIXED_NOW);

    const stats = await services.statistics.getStatistics();

    expect(stats.overview).toEqual({
      totalEmployees: 7,
      activeEmployees: 7,
      totalDepartments: 3,
      totalDistricts: 2,
    });
    expect(stats.attendance).toEqual({ total: 7, present: 2, absent: 1, late: 1, percentage: 42.9 });
    expect(stats.trends.attendance).toEqual({ current: 42.9, change: 2.1 });
    expect(stats.trends.late).toEqual({ current: 14.3, change: -1.5 });
    expect(stats.trends.efficiency).toEqual({ current: 94.8, change: 3.2 });
    expect(stats.departmentData).toEqual([
      { name: "IT bo'limi", value: 3, color: '#8b5cf6', districtId: '1' },
      { name: "Moliya bo'limi", value: 2, color: '#06b6d4', districtId: '1' },
      { name: "Marketing bo'limi", value: 2, color: '#10b981', districtId: '2' },
    ]);
    expect(stats.attendanceData).toHaveLength(5);
    expect(stats.performanceData).toHaveLength(6);
    expect(stats.insights.map((i) => i.type)).toEqual(['positive', 'warning', 'info']);
  });

  it('counts only attendance dated today', async () => {
    await seedCollections(services.store, FIXED_NOW);
    const nextYear = createServices({ dataDir: dir }, () => new Date(2025, 4, 15, 9, 0, 0));

    const stats = await nextYear.statistics.getStatistics('weekly');

    expect(stats.overview.totalEmployees).toBe(7);
    expect(stats.attendance).toEqual({ total: 7, present: 0, absent: 0, late: 0, percentage: 0 });
  });

  it('reports zero percentages with no employees', async () => {
    const stats = await services.statistics.getStatistics();

    expect(stats.overview.totalEmployees).toBe(0);
    expect(stats.attendance.percentage).toBe(0);
    expect(stats.trends.late.current).toBe(0);
    expect(stats.departmentData).toEqual([]);
  });

  it('caps the attendance percentage at 100', async () => {
    await services.store.collection('employees').save([
      {
        id: 'e1', name: 'A', phone: '+1', photo: '', position: 'p', departmentId: 'd1',
        departmentName: 'D', departmentNumber: 'D-1', districtName: 'X', email: '', status: 'active', createdAt: 't',
      },
    ]);
    await services.store.collection('attendance').save(
      ['e1', 'gone-1', 'gone-2'].map((employeeId, i) => ({
        id: `a${i}`, employeeName: 'n', employeeId, department: 'D', date: TODAY,
        checkIn: '09:00', checkOut: '10:00', status: 'present', workHours: '1:00', location: null,
      })),
    );

    const stats = await services.statistics.getStatistics();
    expect(stats.attendance.present).toBe(3);
    expect(stats.attendance.percentage).toBe(100);
  });

  it('rounds exact halves to even', async () => {
    await services.store.collection('employees').save(
      Array.from({ length: 400 }, (_, i) => ({
        id: `e${i}`, name: `E${i}`, phone: `+${i}`, photo: '', position: 'p', departmentId: 'd1',
        departmentName: 'D', departmentNumber: 'D-1', districtName: 'X', email: '', status: 'active', createdAt: 't',
      })),
    );
    await services.store.collection('attendance').save([
      {
        id: 'a1', employeeName: 'E0', employeeId: 'e0', department: 'D', date: TODAY,
        checkIn: '09:20', checkOut: '18:00', status: 'late', workHours: '7:40', location: null,
      },
    ]);

    const stats = await services.statistics.getStatistics();
    expect(stats.trends.late.current).toBe(0.2);
    expect(stats.attendance.percentage).toBe(0.2);
  });

  it('cycles department colors', async () => {
    await services.store.collection('departments').save(
      Array.from({ length: 7 }, (_, i) => ({
        id: `d${i}`, name: `Dept ${i}`, departmentNumber: `N-${i}`, districtId: 'x', districtName: 'X',
        manager: 'm', employeeCount: i, description: '', createdAt: 't',
      })),
    );

    const stats = await services.statistics.getStatistics();
    expect(stats.departmentData[6]).toEqual({ name: 'Dept 6', value: 6, color: '#8b5cf6', districtId: 'x' });
  });
});
