import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { promises as fs } from 'fs';
import path from 'path';
import { JsonStore } from './jsonStore';
import { makeDataDir, removeDataDir, testServices } from '../test/helpers';

describe('JsonStore', () => {
  let dir: string;
  let store: JsonStore;

  beforeEach(async () => {
    dir = await makeDataDir();
    store = new JsonStore(dir);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeDataDir(dir);
  });

  it('reads a missing file as an empty collection', async () => {
    const districts = store.collection('districts');
    expect(await districts.exists()).toBe(false);
    expect(await districts.load()).toEqual([]);
  });

  it('writes a pretty-printed array and keeps non-ASCII text', async () => {
    const districts = store.collection('districts');
    await districts.save([
      { id: 'd1', name: "Farg'ona — markaz", code: 'FRG', description: 'Ўзбек', createdAt: '2024-01-01T00:00:00.000Z' },
    ]);

    const raw = await fs.readFile(path.join(dir, 'districts.json'), 'utf8');
    expect(raw.startsWith('[\n  {\n    "id": "d1",')).toBe(true);
    expect(raw).toContain('"description": "Ўзбек"');
    expect(await districts.exists()).toBe(true);
    expect(await districts.load()).toEqual([
      { id: 'd1', name: "Farg'ona — markaz", code: 'FRG', description: 'Ўзбек', createdAt: '2024-01-01T00:00:00.000Z' },
    ]);
  });

  it('preserves insertion order', async () => {
    const districts = store.collection('districts');
    await districts.save([
      { id: 'b', name: 'B', code: 'B', description: '', createdAt: 't' },
      { id: 'a', name: 'A', code: 'A', description: '', createdAt: 't' },
    ]);
    expect((await districts.load()).map((d) => d.id)).toEqual(['b', 'a']);
  });

  it('creates the data directory on save', async () => {
    const nested = new JsonStore(path.join(dir, 'nested', 'data'));
    await nested.collection('attendance').save([]);
    expect(await fs.readFile(path.join(dir, 'nested', 'data', 'attendance.json'), 'utf8')).toBe('[]');
  });

  it('degrades invalid JSON to an empty collection', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    await fs.writeFile(path.join(dir, 'employees.json'), '[{"id": ', 'utf8');

    expect(await store.collection('employees').load()).toEqual([]);
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });

  it('degrades non-array content to an empty collection', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    await fs.writeFile(path.join(dir, 'departments.json'), '{"id": "x"}', 'utf8');

    expect(await store.collection('departments').load()).toEqual([]);
  });

  it('fills create defaults into records that lack them', async () => {
    await fs.writeFile(
      path.join(dir, 'attendance.json'),
      JSON.stringify([{ id: 'a1', employeeName: 'Ann', employeeId: 'e1', department: 'Ops', date: '2024-05-15' }]),
      'utf8',
    );

    expect(await store.collection('attendance').load()).toEqual([
      {
        id: 'a1',
        employeeName: 'Ann',
        employeeId: 'e1',
        department: 'Ops',
        date: '2024-05-15',
        checkIn: null,
        checkOut: null,
        status: 'absent',
        workHours: '0:00',
        location: null,
      },
    ]);
  });

  it('reads null fields as their defaults and keeps every record through a create', async () => {
    const employee = (id: string, phone: string) => ({
      id,
      name: `Employee ${id}`,
      phone,
      photo: '',
      position: 'Clerk',
      departmentId: 'd1',
      departmentName: 'Ops',
      departmentNumber: 'OPS-1',
      districtName: 'Chilonzor',
      email: `${id}@company.test`,
      status: 'active',
      createdAt: '2024-02-01T10:00:00',
    });
    await fs.writeFile(
      path.join(dir, 'departments.json'),
      JSON.stringify([
        {
          id: 'd1', name: 'Ops', departmentNumber: 'OPS-1', districtId: '1', districtName: 'Chilonzor',
          manager: 'M', employeeCount: 2, description: null, createdAt: '2024-01-01T10:00:00',
        },
      ]),
      'utf8',
    );
    await fs.writeFile(
      path.join(dir, 'employees.json'),
      JSON.stringify([employee('e1', '+1'), { ...employee('e2', '+2'), email: null, badge: 'B-7' }]),
      'utf8',
    );
    const services = testServices(dir);

    expect((await services.employees.list())[1]).toMatchObject({ id: 'e2', email: '', badge: 'B-7' });

    await services.employees.create({ name: 'New', phone: '+3', position: 'Clerk', departmentId: 'd1' });

    const stored = JSON.parse(await fs.readFile(path.join(dir, 'employees.json'), 'utf8'));
    expect(stored.map((e: { id: string }) => e.id).slice(0, 2)).toEqual(['e1', 'e2']);
    expect(stored).toHaveLength(3);
    expect(stored[1]).toMatchObject({ email: '', badge: 'B-7' });
    expect((await services.departments.list())[0]).toMatchObject({ employeeCount: 3, description: '' });
  });

  it('skips entries that are not records and keeps the rest', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    await fs.writeFile(
      path.join(dir, 'districts.json'),
      JSON.stringify([
        { id: 'a', name: 'A', code: 'A1', description: '', createdAt: 't' },
        'not a record',
        { id: 'b', name: 'B', code: 'B1', createdAt: 't' },
      ]),
      'utf8',
    );

    expect((await store.collection('districts').load()).map((d) => d.id)).toEqual(['a', 'b']);
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });
});
