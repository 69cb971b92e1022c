import { Router } from 'express';
import { BOOK_PERMISSIONS } from '../domain/types';
import { NotFoundError } from '../domain/errors';
import { requirePermission } from '../middlewares/requirePermission';
import { toBookJson, toPaginatedBooksJson } from '../resources/bookResource';
import { AuthorizationGate } from '../services/authorizationGate';
import { BookService } from '../services/bookService';
import { parsePositiveInteger } from '../utils/validators';

const bookIdFrom = (value: string): number => {
  const id = parsePositiveInteger(value);
  if (id === undefined) {
    throw new NotFoundError();
  }
  return id;
};

export const createBookController = (bookService: BookService, gate: Pick<AuthorizationGate, 'require'>) => {
  const router = Router();

  router.get('/', requirePermission(gate, BOOK_PERMISSIONS.list), async (req, res, next) => {
    try {
      const page = parsePositiveInteger(req.query.page) ?? 1;
      const result = await bookService.list(page);
      res.json(toPaginatedBooksJson(result, `${req.protocol}://${req.get('host') ?? 'localhost'}${req.baseUrl}`));
    } catch (error) {
      next(error);
    }
  });

  router.post('/', requirePermission(gate, BOOK_PERMISSIONS.create), async (req, res, next) => {
    try {
      const book = await bookService.create(req.body);
      res.status(201).json({ data: toBookJson(book), message: 'Book created successfully' });
    } catch (error) {
      next(error);
    }
  });

  router.get('/:id', requirePermission(gate, BOOK_PERMISSIONS.view), async (req, res, next) => {
    try {
      const book = await bookService.get(bookIdFrom(req.params.id));
      res.json({ data: toBookJson(book) });
    } catch (error) {
      next(error);
    }
  });

  router.put('/:id', requirePermission(gate, BOOK_PERMISSIONS.edit), async (req, res, next) => {
    try {
      const book = await bookService.update(bookIdFrom(req.params.id), req.body);
      res.json({ data: toBookJson(book), message: 'Book updated successfully' });
    } catch (error) {
      next(error);
    }
  });

  router.delete('/:id', requirePermission(gate, BOOK_PERMISSIONS.delete), async (req, res, next) => {
    try {
      await bookService.delete(bookIdFrom(req.params.id));
      res.json({ message: 'Book deleted successfully' });
    } catch (error) {
      next(error);
    }
  });

  return router;
};
