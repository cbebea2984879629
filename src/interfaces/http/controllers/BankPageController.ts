/**
 * Bank Page Controller — HTML Adapter
 * Layer: Interfaces (HTTP)
 *
 * Same BankService as the JSON API, different transport: form-encoded bodies
 * in, rendered pages and redirect-after-post out. A ValidationError from the
 * service becomes an error flash and a redirect back to the form; NotFound
 * and anything else propagate to errorHandler (404 / 500 page).
 *
 * The edit form always posts both fields, so a field missing from the body is
 * read as '' and rejected like an emptied one.
 */
import type { BankService } from '@application/services/BankService';
import { container } from '@core/container';
import { TOKENS } from '@core/types';
import { layout } from '@interfaces/http/views/layout';
import {
  bankDetailView,
  bankListView,
  editBankFormView,
  newBankFormView,
} from '@interfaces/http/views/bankViews';
import type { SafeHtml } from '@interfaces/http/views/html';
import type { FlashCategory } from '@interfaces/http/middleware/session';
import { ValidationError } from '@shared/errors/AppError';
import type { Request, Response } from 'express';

import { parseBankId } from './params';

function formField(body: unknown, field: string): string {
  if (typeof body !== 'object' || body === null) return '';
  const value: unknown = Reflect.get(body, field);
  return typeof value === 'string' ? value : '';
}

function readBankForm(body: unknown): { name: string; location: string } {
  return { name: formField(body, 'name'), location: formField(body, 'location') };
}

export class BankPageController {
  private service: BankService;

  constructor() {
    this.service = container.resolve<BankService>(TOKENS.BankService);
  }

  index = (_req: Request, res: Response): void => {
    res.redirect('/banks');
  };

  list = async (req: Request, res: Response): Promise<void> => {
    const banks = await this.service.list();
    this.render(req, res, 'Banks', bankListView(banks));
  };

  detail = async (req: Request, res: Response): Promise<void> => {
    const bank = await this.service.get(parseBankId(req.params.id));
    this.render(req, res, bank.name, bankDetailView(bank));
  };

  newForm = (req: Request, res: Response): void => {
    this.render(req, res, 'New bank', newBankFormView());
  };

  create = async (req: Request, res: Response): Promise<void> => {
    const saved = await this.attempt(req, () => this.service.create(readBankForm(req.body)));
    if (!saved) {
      res.redirect('/banks/new');
      return;
    }

    this.notify(req, 'success', 'Bank created successfully!');
    res.redirect('/banks');
  };

  editForm = async (req: Request, res: Response): Promise<void> => {
    const bank = await this.service.get(parseBankId(req.params.id));
    this.render(req, res, `Edit ${bank.name}`, editBankFormView(bank));
  };

  update = async (req: Request, res: Response): Promise<void> => {
    const id = parseBankId(req.params.id);
    const saved = await this.attempt(req, () => this.service.update(id, readBankForm(req.body)));
    if (!saved) {
      res.redirect(`/banks/${id}/edit`);
      return;
    }

    this.notify(req, 'success', 'Bank updated successfully!');
    res.redirect(`/banks/${id}`);
  };

  delete = async (req: Request, res: Response): Promise<void> => {
    await this.service.delete(parseBankId(req.params.id));
    this.notify(req, 'success', 'Bank deleted successfully!');
    res.redirect('/banks');
  };

  /** Run a write; on a validation failure flash the reason and report false. */
  private async attempt(req: Request, write: () => Promise<unknown>): Promise<boolean> {
    try {
      await write();
      return true;
    } catch (err) {
      if (err instanceof ValidationError) {
        this.notify(req, 'error', err.message);
        return false;
      }
      throw err;
    }
  }

  private notify(req: Request, category: FlashCategory, message: string): void {
    req.flash(category, message);
  }

  private render(req: Request, res: Response, title: string, body: SafeHtml): void {
    res.status(200).type('html').send(layout({ title, body, flashes: req.consumeFlash() }));
  }
}
