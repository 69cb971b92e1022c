import test from 'node:test';
import assert from 'assert';
import { AuthorizationEngine } from '../src/services/authorizationEngine';
import { PermissionCatalog } from '../src/services/permissionCatalog';
import { RoleAssignment } from '../src/services/roleAssignment';
import { authorizationDecisions } from '../src/utils/metrics';
import { buildEngineStack, InMemoryStore } from './support/inMemoryStore';

const decisionCount = async (outcome: string): Promise<number> => {
  const metric = await authorizationDecisions.get();
  return metric.values.find((value) => value.labels.outcome === outcome)?.value ?? 0;
};

const deferred = <T>() => {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((done, fail) => {
    resolve = done;
    reject = fail;
  });
  return { promise, resolve, reject };
};

test('an uninitialized engine denies everyone but the System Actor', async () => {
  const store = new InMemoryStore();
  store.grant(2, 'editor', ['books.edit']);
  const { engine } = buildEngineStack(store);

  assert.strictEqual(engine.state, 'uninitialized');
  assert.strictEqual(await engine.evaluate(2, 'books.edit'), false);
  assert.strictEqual(await engine.evaluate(1, 'books.edit'), true);
});

test('grants through roles once initialized', async () => {
  const store = new InMemoryStore();
  store.grant(2, 'editor', ['books.list', 'books.edit']);
  store.permissions.push({ id: 3, name: 'books.delete' });
  const { engine } = buildEngineStack(store);

  await engine.initialize();

  assert.strictEqual(engine.state, 'ready');
  assert.strictEqual(await engine.evaluate(2, 'books.edit'), true);
  assert.strictEqual(await engine.evaluate(2, 'books.delete'), false);
  assert.strictEqual(await engine.evaluate(3, 'books.list'), false);
});

test('the System Actor is allowed any name without a lookup', async () => {
  const store = new InMemoryStore();
  const { engine } = buildEngineStack(store);
  await engine.initialize();

  assert.strictEqual(await engine.evaluate(1, 'books.delete'), true);
  assert.strictEqual(await engine.evaluate(1, 'never.registered'), true);
  assert.strictEqual(await engine.evaluate(1, ''), true);
  assert.strictEqual(store.roleLookups, 0);
});

test('unregistered names deny without consulting roles', async () => {
  const store = new InMemoryStore();
  store.grant(2, 'editor', ['books.edit']);
  const { engine } = buildEngineStack(store);
  await engine.initialize();

  assert.strictEqual(await engine.evaluate(2, 'books.archive'), false);
  assert.strictEqual(engine.isRegistered('books.archive'), false);
  assert.strictEqual(store.roleLookups, 0);
});

test('role changes apply without re-initializing', async () => {
  const store = new InMemoryStore();
  store.grant(2, 'editor', ['books.edit']);
  const { engine } = buildEngineStack(store);
  await engine.initialize();
  assert.strictEqual(await engine.evaluate(2, 'books.edit'), true);

  await store.detachPermission(1, 1);

  assert.strictEqual(await engine.evaluate(2, 'books.edit'), false);
});

test('permissions created after initialize are honored only after re-initializing', async () => {
  const store = new InMemoryStore();
  store.grant(2, 'editor', ['books.list']);
  const { engine } = buildEngineStack(store);
  await engine.initialize();

  store.grant(2, 'editor', ['books.export']);
  assert.strictEqual(await engine.evaluate(2, 'books.export'), false);

  await engine.initialize();
  assert.strictEqual(await engine.evaluate(2, 'books.export'), true);
});

test('re-initializing replaces the snapshot instead of merging it', async () => {
  const store = new InMemoryStore();
  store.permissions = [
    { id: 1, name: 'books.list' },
    { id: 2, name: 'books.view' }
  ];
  const { engine } = buildEngineStack(store);
  await engine.initialize();
  assert.deepStrictEqual(engine.registeredPermissions(), ['books.list', 'books.view']);

  await store.deletePermission('books.list');
  await engine.initialize();
  await engine.initialize();

  assert.deepStrictEqual(engine.registeredPermissions(), ['books.view']);
  assert.strictEqual(engine.isRegistered('books.list'), false);
});

test('an empty catalog leaves the engine ready and denying', async () => {
  const store = new InMemoryStore();
  store.userRoles.push({ userId: 2, roleId: 1 });
  const { engine } = buildEngineStack(store);

  await engine.initialize();

  assert.strictEqual(engine.state, 'ready');
  assert.deepStrictEqual(engine.registeredPermissions(), []);
  assert.strictEqual(await engine.evaluate(2, 'books.list'), false);
  assert.strictEqual(await engine.evaluate(1, 'books.list'), true);
});

test('an unavailable catalog initializes to an empty snapshot', async () => {
  const store = new InMemoryStore();
  store.grant(2, 'editor', ['books.list']);
  store.permissionFailure = new Error('Requested entity was not found.');
  const { engine } = buildEngineStack(store);

  await engine.initialize();

  assert.strictEqual(engine.state, 'ready');
  assert.strictEqual(await engine.evaluate(2, 'books.list'), false);
});

test('an older initialize never replaces a newer published snapshot', async () => {
  const pending = [deferred<string[]>(), deferred<string[]>(), deferred<string[]>(), deferred<string[]>()];
  let call = 0;
  const catalog = new PermissionCatalog({
    listPermissionNames: () => pending[call++].promise
  });
  const engine = new AuthorizationEngine(catalog, new RoleAssignment(new InMemoryStore()));

  const first = engine.initialize();
  const second = engine.initialize();
  pending[1].resolve(['books.view']);
  pending[0].resolve(['books.list']);
  await Promise.all([first, second]);
  assert.deepStrictEqual(engine.registeredPermissions(), ['books.view']);

  const third = engine.initialize();
  const fourth = engine.initialize();
  pending[2].resolve(['books.create']);
  await third;
  assert.deepStrictEqual(engine.registeredPermissions(), ['books.create']);
  pending[3].resolve(['books.delete']);
  await fourth;
  assert.deepStrictEqual(engine.registeredPermissions(), ['books.delete']);
});

test('a cancelled newer initialize leaves the older run free to publish', async () => {
  const pending = [deferred<string[]>(), deferred<string[]>()];
  let call = 0;
  const catalog = new PermissionCatalog({
    listPermissionNames: () => pending[call++].promise
  });
  const engine = new AuthorizationEngine(catalog, new RoleAssignment(new InMemoryStore()));
  const controller = new AbortController();

  const older = engine.initialize();
  const newer = engine.initialize({ signal: controller.signal });
  controller.abort();
  pending[1].reject(new Error('request cancelled'));
  await assert.rejects(newer, { message: 'request cancelled' });

  pending[0].resolve(['books.list']);
  await older;

  assert.strictEqual(engine.state, 'ready');
  assert.deepStrictEqual(engine.registeredPermissions(), ['books.list']);
});

test('role lookup failures propagate instead of denying or allowing', async () => {
  const store = new InMemoryStore();
  store.permissions = [{ id: 1, name: 'books.list' }];
  const engine = new AuthorizationEngine(
    new PermissionCatalog(store),
    new RoleAssignment({
      actorHasPermissionViaRoles: async () => {
        throw new Error('The service is currently unavailable.');
      }
    })
  );
  await engine.initialize();

  await assert.rejects(engine.evaluate(2, 'books.list'), { message: 'The service is currently unavailable.' });
});

test('an aborted check rejects', async () => {
  const store = new InMemoryStore();
  store.grant(2, 'editor', ['books.list']);
  const { engine } = buildEngineStack(store);
  await engine.initialize();
  const controller = new AbortController();
  controller.abort();

  await assert.rejects(engine.evaluate(2, 'books.list', { signal: controller.signal }), { name: 'AbortError' });
});

test('counts decisions by outcome', async () => {
  const store = new InMemoryStore();
  store.grant(2, 'editor', ['books.list']);
  const { engine } = buildEngineStack(store);
  await engine.initialize();
  const before = {
    system: await decisionCount('system'),
    unregistered: await decisionCount('unregistered'),
    granted: await decisionCount('granted'),
    denied: await decisionCount('denied')
  };

  await engine.evaluate(1, 'books.list');
  await engine.evaluate(2, 'books.unknown');
  await engine.evaluate(2, 'books.list');
  await engine.evaluate(3, 'books.list');

  assert.strictEqual(await decisionCount('system'), before.system + 1);
  assert.strictEqual(await decisionCount('unregistered'), before.unregistered + 1);
  assert.strictEqual(await decisionCount('granted'), before.granted + 1);
  assert.strictEqual(await decisionCount('denied'), before.denied + 1);
});

test('editor scenario: grants, denials and the detach that follows', async () => {
  const store = new InMemoryStore();
  store.grant(7, 'editor', ['books.create']);
  store.permissions.push({ id: 2, name: 'books.delete' });
  const { engine } = buildEngineStack(store);
  await engine.initialize();

  assert.strictEqual(await engine.evaluate(7, 'books.create'), true);
  assert.strictEqual(await engine.evaluate(7, 'books.delete'), false);
  assert.strictEqual(await engine.evaluate(1, 'books.delete'), true);
  assert.strictEqual(await engine.evaluate(99, 'books.create'), false);

  await store.revokeRole(7, 1);

  assert.strictEqual(await engine.evaluate(7, 'books.create'), false);
});

test('holding any role that carries the permission is enough', async () => {
  const store = new InMemoryStore();
  store.grant(4, 'reader', ['books.list']);
  store.grant(4, 'archivist', ['books.delete']);
  store.grant(5, 'reader', []);
  const { engine } = buildEngineStack(store);
  await engine.initialize();

  assert.strictEqual(await engine.evaluate(4, 'books.delete'), true);
  assert.strictEqual(await engine.evaluate(4, 'books.list'), true);
  assert.strictEqual(await engine.evaluate(5, 'books.delete'), false);
});

test('re-initializing unchanged data leaves every decision unchanged', async () => {
  const store = new InMemoryStore();
  store.grant(2, 'editor', ['books.create', 'books.edit']);
  store.grant(3, 'reader', ['books.list']);
  const { engine } = buildEngineStack(store);
  const pairs: Array<[number, string]> = [];
  for (const actorId of [1, 2, 3, 4]) {
    for (const name of ['books.create', 'books.edit', 'books.list', 'books.unknown']) {
      pairs.push([actorId, name]);
    }
  }
  const decisions = async (): Promise<boolean[]> =>
    Promise.all(pairs.map(([actorId, name]) => engine.evaluate(actorId, name)));

  await engine.initialize();
  const before = await decisions();
  await engine.initialize();

  assert.deepStrictEqual(await decisions(), before);
  assert.deepStrictEqual(before.slice(4, 8), [true, true, false, false]);
});
