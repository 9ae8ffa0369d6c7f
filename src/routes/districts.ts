import { Router } from 'express';
import { createDistrictSchema, updateDistrictSchema } from '../schemas';
import type { DistrictService } from '../services/districtService';
import { sendData } from '../utils/response';

export default function districtsRouter(districts: DistrictService) {
  const router = Router();

  router.get('/', async (_req, res, next) => {
    try {
      sendData(res, await districts.list());
    } catch (error) {
      next(error);
    }
  });

  router.post('/', async (req, res, next) => {
    try {
      const input = createDistrictSchema.parse(req.body);
      const created = await districts.create(input);
      sendData(res, created, 'District created');
    } catch (error) {
      next(error);
    }
  });

  router.put('/:id', async (req, res, next) => {
    try {
      const patch = updateDistrictSchema.parse(req.body);
      const updated = await districts.update(req.params.id, patch);
      sendData(res, updated, 'District updated');
    } catch (error) {
      next(error);
    }
  });

  router.delete('/:id', async (req, res, next) => {
    try {
      await districts.delete(req.params.id);
      sendData(res, null, 'District deleted');
    } catch (error) {
      next(error);
    }
  });

  return router;
}
