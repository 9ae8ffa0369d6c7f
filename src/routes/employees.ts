import { Router } from 'express';
import { createEmployeeSchema, updateEmployeeSchema } from '../schemas';
import type { EmployeeService } from '../services/employeeService';
import { sendData } from '../utils/response';

export default function employeesRouter(employees: EmployeeService) {
  const router = Router();

  router.get('/', async (_req, res, next) => {
    try {
      sendData(res, await employees.list());
    } catch (error) {
      next(error);
    }
  });

  router.post('/', async (req, res, next) => {
    try {
      const input = createEmployeeSchema.parse(req.body);
      const created = await employees.create(input);
      sendData(res, created, 'Employee created');
    } catch (error) {
      next(error);
    }
  });

  router.put('/:id', async (req, res, next) => {
    try {
      const patch = updateEmployeeSchema.parse(req.body);
      const updated = await employees.update(req.params.id, patch);
      sendData(res, updated, 'Employee updated');
    } catch (error) {
      next(error);
    }
  });

  router.delete('/:id', async (req, res, next) => {
    try {
      await employees.delete(req.params.id);
      sendData(res, null, 'Employee deleted');
    } catch (error) {
      next(error);
    }
  });

  return router;
}
