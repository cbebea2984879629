/**
 * Bank API Controller — JSON Adapter
 * Layer: Interfaces (HTTP)
 *
 * Thin: read the id and body, call BankService, send JSON. Validation and 404s
 * are thrown by the service and turned into responses by errorHandler. Bank
 * bodies go out bare (`{ id, name, location }`), with no envelope.
 *
 * Arrow-function properties keep `this` bound when Express calls them.
 */
import type { BankService } from '@application/services/BankService';
import { container } from '@core/container';
import { TOKENS } from '@core/types';
import type { Request, Response } from 'express';

import { parseBankId } from './params';

export class BankApiController {
  private service: BankService;

  constructor() {
    this.service = container.resolve<BankService>(TOKENS.BankService);
  }

  list = async (_req: Request, res: Response): Promise<void> => {
    res.status(200).json(await this.service.list());
  };

  get = async (req: Request, res: Response): Promise<void> => {
    const bank = await this.service.get(parseBankId(req.params.id));
    res.status(200).json(bank);
  };

  create = async (req: Request, res: Response): Promise<void> => {
    const bank = await this.service.create(req.body);
    res.status(201).json(bank);
  };

  update = async (req: Request, res: Response): Promise<void> => {
    const bank = await this.service.update(parseBankId(req.params.id), req.body);
    res.status(200).json(bank);
  };

  delete = async (req: Request, res: Response): Promise<void> => {
    await this.service.delete(parseBankId(req.params.id));
    res.status(200).json({ message: 'Bank deleted' });
  };
}
