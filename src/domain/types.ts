export type ActorId = number;

/**
 * The System Actor bypasses every authorization decision. The id is part of
 * the data model, never configuration.
 */
export const SYSTEM_ACTOR_ID: ActorId = 1;

export interface Permission {
  id: number;
  name: string;
}

export interface Role {
  id: number;
  name: string;
}

export interface User {
  id: ActorId;
  name: string;
  email: string;
  passwordHash: string;
  createdAt: string;
  updatedAt: string;
}

export interface Book {
  id: number;
  title: string;
  description: string;
  createdAt: string;
  updatedAt: string;
}

export interface BookPage {
  items: Book[];
  total: number;
  page: number;
  perPage: number;
}

export const BOOK_PERMISSIONS = Object.freeze({
  list: 'books.list',
  view: 'books.view',
  create: 'books.create',
  edit: 'books.edit',
  delete: 'books.delete'
});

export const ACCESS_MANAGE_PERMISSION = 'access.manage';
