import { Router } from 'express';
import { statisticsQuerySchema } from '../schemas';
import type { StatisticsService } from '../services/statisticsService';
import { sendData } from '../utils/response';

export default function statisticsRouter(statistics: StatisticsService) {
  const router = Router();

  router.get('/', async (req, res, next) => {
    try {
      const { period } = statisticsQuerySchema.parse(req.query);
      sendData(res, await statistics.getStatistics(period));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
