import test from 'node:test';
import assert from 'assert';
import { NotFoundError, ValidationError } from '../src/domain/errors';
import { AccessAdminService } from '../src/services/accessAdminService';
import { buildEngineStack, InMemoryStore } from './support/inMemoryStore';

const setup = async () => {
  const store = new InMemoryStore();
  store.grant(2, 'editor', ['books.list', 'books.edit']);
  const { engine } = buildEngineStack(store);
  await engine.initialize();
  return { store, engine, service: new AccessAdminService(store, engine) };
};

test('lists the registered permissions from the engine snapshot', async () => {
  const { store, service } = await setup();
  store.permissions.push({ id: 9, name: 'books.export' });

  assert.deepStrictEqual(service.listPermissions(), ['books.list', 'books.edit']);
});

test('creating a permission registers it with the engine', async () => {
  const { engine, service } = await setup();

  const permission = await service.createPermission({ name: ' books.export ' });

  assert.deepStrictEqual(permission, { id: 3, name: 'books.export' });
  assert.strictEqual(engine.isRegistered('books.export'), true);
});

test('rejects duplicate and malformed permission names', async () => {
  const { service } = await setup();

  await assert.rejects(service.createPermission({ name: 'books.list' }), {
    message: 'The name has already been taken.'
  });
  await assert.rejects(service.createPermission({ name: 'Books List' }), {
    message: 'The name field format is invalid.'
  });
  await assert.rejects(service.createPermission({}), { message: 'The name field is required.' });
});

test('deleting a permission unregisters it and revokes it', async () => {
  const { engine, service } = await setup();

  await service.deletePermission('books.edit');

  assert.strictEqual(engine.isRegistered('books.edit'), false);
  assert.strictEqual(await engine.evaluate(2, 'books.edit'), false);
  await assert.rejects(service.deletePermission('books.edit'), NotFoundError);
});

test('creates and deletes roles', async () => {
  const { store, service } = await setup();

  const role = await service.createRole({ name: 'reader' });
  assert.deepStrictEqual(role, { id: 2, name: 'reader' });
  await assert.rejects(service.createRole({ name: 'editor' }), { message: 'The name has already been taken.' });

  await service.deleteRole(1);
  assert.deepStrictEqual(store.userRoles, []);
  await assert.rejects(service.deleteRole(1), NotFoundError);
});

test('syncs role permissions by name', async () => {
  const { engine, service } = await setup();

  const names = await service.syncRolePermissions(1, { permissions: ['books.edit', 'books.edit'] });

  assert.deepStrictEqual(names, ['books.edit']);
  assert.strictEqual(await engine.evaluate(2, 'books.edit'), true);
  assert.strictEqual(await engine.evaluate(2, 'books.list'), false);
});

test('rejects unknown names and malformed lists in a role sync', async () => {
  const { service } = await setup();

  await assert.rejects(service.syncRolePermissions(1, { permissions: ['books.list', 'books.burn'] }), (error: unknown) => {
    assert.ok(error instanceof ValidationError);
    assert.deepStrictEqual(error.errors, { permissions: ['Unknown permissions: books.burn.'] });
    return true;
  });
  await assert.rejects(service.syncRolePermissions(1, { permissions: 'books.list' }), {
    message: 'The permissions field must be an array.'
  });
  await assert.rejects(service.syncRolePermissions(1, { permissions: [7] }), {
    message: 'The permissions field contains an invalid value.'
  });
  await assert.rejects(service.syncRolePermissions(5, { permissions: [] }), NotFoundError);
});

test('syncs user roles by id', async () => {
  const { store, engine, service } = await setup();

  const roles = await service.syncUserRoles(3, { roles: [1, '1'] });

  assert.deepStrictEqual(roles, [1]);
  assert.strictEqual(await engine.evaluate(3, 'books.list'), true);
  await assert.rejects(service.syncUserRoles(3, { roles: [4] }), { message: 'Unknown roles: 4.' });
  assert.deepStrictEqual(store.userRoles, [
    { userId: 2, roleId: 1 },
    { userId: 3, roleId: 1 }
  ]);
});

test('attaches and detaches single permissions and roles', async () => {
  const { store, engine, service } = await setup();
  store.permissions.push({ id: 3, name: 'books.delete' });
  await engine.initialize();

  await service.attachPermission(1, 'books.delete');
  await service.assignRole(4, 1);
  assert.strictEqual(await engine.evaluate(4, 'books.delete'), true);

  await service.detachPermission(1, 'books.delete');
  assert.strictEqual(await engine.evaluate(4, 'books.delete'), false);
  assert.strictEqual(await engine.evaluate(4, 'books.list'), true);

  await service.revokeRole(4, 1);
  assert.strictEqual(await engine.evaluate(4, 'books.list'), false);

  await assert.rejects(service.attachPermission(1, 'books.burn'), NotFoundError);
  await assert.rejects(service.assignRole(4, 9), NotFoundError);
});
