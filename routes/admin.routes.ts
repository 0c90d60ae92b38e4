import { RequestHandler, Router } from 'express';
import { AdminController } from '../controllers/admin';
import { validateFields } from '../middlewares/field-validator';

/** Every route here expects authenticate + admin guard in front of it. */
export const createAdminRoutes = (controller: AdminController, guards: RequestHandler[]) => {
  const adminRoutes = Router();
  adminRoutes.use(...guards);

  adminRoutes.put(
    '/utilization',
    validateFields([
      { name: 'kinkBps', type: 'amount' },
      { name: 'baseRateBps', type: 'amount' },
      { name: 'lowSlope', type: 'amount' },
      { name: 'highSlope', type: 'amount' },
    ]),
    controller.setUtilizationConfig
  );
  adminRoutes.put(
    '/tiers/:tier',
    validateFields([
      { name: 'minDeposit', type: 'amount' },
      { name: 'bonusBps', type: 'amount' },
    ]),
    controller.setTierConfig
  );
  adminRoutes.put(
    '/locks/:period',
    validateFields([
      { name: 'duration', type: 'amount' },
      { name: 'bonusMultiplierBps', type: 'amount' },
    ]),
    controller.setLockConfig
  );
  adminRoutes.put(
    '/performance-fee',
    validateFields([
      { name: 'feeBps', type: 'amount' },
      { name: 'recipient', type: 'string' },
    ]),
    controller.setPerformanceFeeConfig
  );
  adminRoutes.post('/high-water-mark', controller.updateGlobalHighWaterMark);
  adminRoutes.get('/events', controller.listEvents);

  return adminRoutes;
};
