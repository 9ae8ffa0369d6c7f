import { Router } from 'express';
import { attendanceQuerySchema, upsertAttendanceSchema } from '../schemas';
import type { AttendanceService } from '../services/attendanceService';
import { sendData } from '../utils/response';

export default function attendanceRouter(attendance: AttendanceService) {
  const router = Router();

  router.get('/', async (req, res, next) => {
    try {
      const { date } = attendanceQuerySchema.parse(req.query);
      sendData(res, await attendance.listByDate(date));
    } catch (error) {
      next(error);
    }
  });

  // Create-or-update keyed by (employeeId, date); responds without the record.
  router.post('/', async (req, res, next) => {
    try {
      const input = upsertAttendanceSchema.parse(req.body);
      await attendance.upsert(input);
      sendData(res, null, 'Attendance recorded');
    } catch (error) {
      next(error);
    }
  });

  return router;
}
