import { Router } from 'express';
import { createDepartmentSchema, updateDepartmentSchema } from '../schemas';
import type { DepartmentService } from '../services/departmentService';
import { sendData } from '../utils/response';

export default function departmentsRouter(departments: DepartmentService) {
  const router = Router();

  router.get('/', async (_req, res, next) => {
    try {
      sendData(res, await departments.list());
    } catch (error) {
      next(error);
    }
  });

  router.post('/', async (req, res, next) => {
    try {
      const input = createDepartmentSchema.parse(req.body);
      const created = await departments.create(input);
      sendData(res, created, 'Department created');
    } catch (error) {
      next(error);
    }
  });

  router.put('/:id', async (req, res, next) => {
    try {
      const patch = updateDepartmentSchema.parse(req.body);
      const updated = await departments.update(req.params.id, patch);
      sendData(res, updated, 'Department updated');
    } catch (error) {
      next(error);
    }
  });

  router.delete('/:id', async (req, res, next) => {
    try {
      await departments.delete(req.params.id);
      sendData(res, null, 'Department deleted');
    } catch (error) {
      next(error);
    }
  });

  return router;
}
