import { NotFoundError } from '../domain/errors';
import { Book, BookPage } from '../domain/types';
import { BookRepository } from '../repositories/interfaces';
import { FieldRules, validatePayload } from '../utils/validators';

export const BOOKS_PER_PAGE = 10;

const STORE_RULES: Record<'title' | 'description', FieldRules> = {
  title: { required: true, max: 255 },
  description: { required: true }
};

const UPDATE_RULES: Record<'title' | 'description', FieldRules> = {
  title: { sometimes: true, required: true, max: 255 },
  description: { sometimes: true, required: true }
};

export class BookService {
  constructor(private readonly repository: BookRepository) {}

  async list(page = 1): Promise<BookPage> {
    const current = Number.isInteger(page) && page > 0 ? page : 1;
    return this.repository.paginateBooks(current, BOOKS_PER_PAGE);
  }

  async get(id: number): Promise<Book> {
    const book = await this.repository.getBook(id);
    if (!book) {
      throw new NotFoundError();
    }
    return book;
  }

  async create(payload: unknown): Promise<Book> {
    const { title = '', description = '' } = validatePayload(payload, STORE_RULES);
    return this.repository.createBook({ title, description });
  }

  async update(id: number, payload: unknown): Promise<Book> {
    const input = validatePayload(payload, UPDATE_RULES);
    const book = await this.repository.updateBook(id, input);
    if (!book) {
      throw new NotFoundError();
    }
    return book;
  }

  async delete(id: number): Promise<void> {
    const removed = await this.repository.deleteBook(id);
    if (!removed) {
      throw new NotFoundError();
    }
  }
}
