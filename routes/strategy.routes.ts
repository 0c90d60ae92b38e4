import { RequestHandler, Router } from 'express';
import { StrategyController } from '../controllers/strategy';
import { validateFields } from '../middlewares/field-validator';
import { LOCK_PERIOD_ORDER } from '../types';

export const createStrategyRoutes = (controller: StrategyController, authenticate: RequestHandler) => {
  const strategyRoutes = Router();

  strategyRoutes.get('/rate', controller.getRate);
  strategyRoutes.get('/config', controller.getConfig);
  strategyRoutes.get('/users/:user', controller.getStrategyInfo);
  strategyRoutes.get('/users/:user/lock', controller.getLock);
  strategyRoutes.post(
    '/lock',
    authenticate,
    validateFields([{ name: 'period', type: 'enum', values: LOCK_PERIOD_ORDER }]),
    controller.lockDeposit
  );
  strategyRoutes.post('/unlock', authenticate, controller.unlockDeposit);
  strategyRoutes.post('/withdraw', authenticate, validateFields([{ name: 'amount', type: 'amount' }]), controller.withdraw);

  return strategyRoutes;
};
