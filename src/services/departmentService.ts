import { v4 as uuidv4 } from 'uuid';
import { ConflictError, DuplicateKeyError, NotFoundError } from '../errors';
import type { CreateDepartmentInput, Department, DepartmentPatch } from '../types';
import { applyPatch } from '../utils/patch';
import type { ServiceContext } from './context';

export class DepartmentService {
  constructor(private readonly ctx: ServiceContext) {}

  private get departments() {
    return this.ctx.store.collection('departments');
  }

  list(): Promise<Department[]> {
    return this.departments.load();
  }

  async create(input: CreateDepartmentInput): Promise<Department> {
    const departments = await this.departments.load();
    const districts = await this.ctx.store.collection('districts').load();

    const taken = departments.some(
      (d) => d.departmentNumber === input.departmentNumber && d.districtId === input.districtId,
    );
    if (taken) throw new DuplicateKeyError('Department number already exists in this district');

    const district = districts.find((d) => d.id === input.districtId);
    if (!district) throw new NotFoundError('District not found');

    const department: Department = {
      id: uuidv4(),
      name: input.name,
      departmentNumber: input.departmentNumber,
      districtId: input.districtId,
      districtName: district.name,
      manager: input.manager,
      employeeCount: 0,
      description: input.description ?? '',
      createdAt: this.ctx.now().toISOString(),
    };
    departments.push(department);
    await this.departments.save(departments);
    return department;
  }

  // Renames are not copied onto employees' denormalized departmentName.
  async update(id: string, patch: DepartmentPatch): Promise<Department> {
    const departments = await this.departments.load();
    const index = departments.findIndex((d) => d.id === id);
    if (index === -1) throw new NotFoundError('Department not found');

    departments[index] = applyPatch(departments[index], patch);
    await this.departments.save(departments);
    return departments[index];
  }

  async delete(id: string): Promise<void> {
    const employees = await this.ctx.store.collection('employees').load();
    if (employees.some((emp) => emp.departmentId === id)) {
      throw new ConflictError('Department still has employees');
    }

    const departments = await this.departments.load();
    await this.departments.save(departments.filter((d) => d.id !== id));
  }
}
