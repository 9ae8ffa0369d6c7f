import { v4 as uuidv4 } from 'uuid';
import { DuplicateKeyError, NotFoundError } from '../errors';
import type { CreateEmployeeInput, Employee, EmployeePatch } from '../types';
import { applyPatch } from '../utils/patch';
import type { ServiceContext } from './context';

export class EmployeeService {
  constructor(private readonly ctx: ServiceContext) {}

  private get employees() {
    return this.ctx.store.collection('employees');
  }

  private get departments() {
    return this.ctx.store.collection('departments');
  }

  list(): Promise<Employee[]> {
    return this.employees.load();
  }

  /**
   * Copies the department's name, number and district name onto the new
   * employee, then bumps the department's employeeCount. The two files are
   * written one after the other, not atomically.
   */
  async create(input: CreateEmployeeInput): Promise<Employee> {
    const employees = await this.employees.load();
    if (employees.some((emp) => emp.phone === input.phone)) {
      throw new DuplicateKeyError('Phone number already exists');
    }

    const department = (await this.departments.load()).find((d) => d.id === input.departmentId);
    if (!department) throw new NotFoundError('Department not found');

    const employee: Employee = {
      id: uuidv4(),
      name: input.name,
      phone: input.phone,
      photo: input.photo ?? '',
      position: input.position,
      departmentId: input.departmentId,
      departmentName: department.name,
      departmentNumber: department.departmentNumber,
      districtName: department.districtName,
      email: input.email ?? '',
      status: input.status ?? 'active',
      createdAt: this.ctx.now().toISOString(),
    };
    employees.push(employee);
    await this.employees.save(employees);

    await this.adjustEmployeeCount(employee.departmentId, 1);
    return employee;
  }

  // departmentId changes here leave the denormalized fields and counts as they were.
  async update(id: string, patch: EmployeePatch): Promise<Employee> {
    const employees = await this.employees.load();
    const index = employees.findIndex((emp) => emp.id === id);
    if (index === -1) throw new NotFoundError('Employee not found');

    employees[index] = applyPatch(employees[index], patch);
    await this.employees.save(employees);
    return employees[index];
  }

  async delete(id: string): Promise<void> {
    const employees = await this.employees.load();
    const employee = employees.find((emp) => emp.id === id);
    if (!employee) throw new NotFoundError('Employee not found');

    await this.employees.save(employees.filter((emp) => emp.id !== id));
    await this.adjustEmployeeCount(employee.departmentId, -1);
  }

  private async adjustEmployeeCount(departmentId: string, delta: number) {
    const departments = await this.departments.load();
    const department = departments.find((d) => d.id === departmentId);
    if (department) {
      department.employeeCount = Math.max(0, department.employeeCount + delta);
    }
    await this.departments.save(departments);
  }
}
