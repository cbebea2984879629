/**
 * Bank Page Routes
 * Layer: Interfaces (HTTP)
 *
 *   GET   /                    →  redirect to /banks
 *   GET   /banks               →  list
 *   GET   /banks/new           →  create form     POST →  create
 *   GET   /banks/:id           →  detail
 *   GET   /banks/:id/edit      →  edit form       POST →  update
 *   POST  /banks/:id/delete    →  delete
 *
 * `/banks/new` is registered before `/banks/:id` so "new" is never read as an id.
 */
import { BankPageController } from '@interfaces/http/controllers/BankPageController';
import { Router } from 'express';

export function bankPageRoutes(): Router {
  const router = Router();
  const controller = new BankPageController();

  router.get('/', controller.index);
  router.get('/banks', controller.list);
  router.get('/banks/new', controller.newForm);
  router.post('/banks/new', controller.create);
  router.get('/banks/:id', controller.detail);
  router.get('/banks/:id/edit', controller.editForm);
  router.post('/banks/:id/edit', controller.update);
  router.post('/banks/:id/delete', controller.delete);

  return router;
}
