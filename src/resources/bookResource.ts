import { Book, BookPage } from '../domain/types';

export interface BookJson {
  id: number;
  title: string;
  description: string;
  created_at: string;
  updated_at: string;
}

export interface PaginatedBooksJson {
  data: BookJson[];
  links: {
    first: string;
    last: string;
    prev: string | null;
    next: string | null;
  };
  meta: {
    current_page: number;
    from: number | null;
    last_page: number;
    per_page: number;
    to: number | null;
    total: number;
  };
}

export const toBookJson = (book: Book): BookJson => ({
  id: book.id,
  title: book.title,
  description: book.description,
  created_at: book.createdAt,
  updated_at: book.updatedAt
});

export const toPaginatedBooksJson = (result: BookPage, baseUrl: string): PaginatedBooksJson => {
  const lastPage = Math.max(1, Math.ceil(result.total / result.perPage));
  const pageUrl = (page: number): string => `${baseUrl}?page=${page}`;
  const from = result.items.length ? (result.page - 1) * result.perPage + 1 : null;

  return {
    data: result.items.map(toBookJson),
    links: {
      first: pageUrl(1),
      last: pageUrl(lastPage),
      prev: result.page > 1 ? pageUrl(result.page - 1) : null,
      next: result.page < lastPage ? pageUrl(result.page + 1) : null
    },
    meta: {
      current_page: result.page,
      from,
      last_page: lastPage,
      per_page: result.perPage,
      to: from === null ? null : from + result.items.length - 1,
      total: result.total
    }
  };
};
