/**
 * Bank API Routes
 * Layer: Interfaces (HTTP)
 *
 * Mounted under `/api/banks` in app.ts:
 *
 *   GET         /api/banks       →  controller.list
 *   POST        /api/banks       →  controller.create
 *   GET         /api/banks/:id   →  controller.get
 *   PUT, PATCH  /api/banks/:id   →  controller.update (both partial)
 *   DELETE      /api/banks/:id   →  controller.delete
 *
 * Built per app so the controller resolves BankService from the container as
 * it stands when createApp() runs.
 */
import { BankApiController } from '@interfaces/http/controllers/BankApiController';
import { Router } from 'express';

export function bankApiRoutes(): Router {
  const router = Router();
  const controller = new BankApiController();

  router.get('/', controller.list);
  router.post('/', controller.create);
  router.get('/:id', controller.get);
  router.put('/:id', controller.update);
  router.patch('/:id', controller.update);
  router.delete('/:id', controller.delete);

  return router;
}
