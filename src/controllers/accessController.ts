import { Router } from 'express';
import { ACCESS_MANAGE_PERMISSION } from '../domain/types';
import { NotFoundError } from '../domain/errors';
import { requirePermission } from '../middlewares/requirePermission';
import { AccessAdminService } from '../services/accessAdminService';
import { AuthorizationGate } from '../services/authorizationGate';
import { parsePositiveInteger } from '../utils/validators';

const idFrom = (value: string): number => {
  const id = parsePositiveInteger(value);
  if (id === undefined) {
    throw new NotFoundError();
  }
  return id;
};

export const createAccessController = (adminService: AccessAdminService, gate: Pick<AuthorizationGate, 'require'>) => {
  const router = Router();

  router.use(requirePermission(gate, ACCESS_MANAGE_PERMISSION));

  router.get('/permissions', (_req, res) => {
    res.json({ data: adminService.listPermissions() });
  });

  router.post('/permissions', async (req, res, next) => {
    try {
      const permission = await adminService.createPermission(req.body);
      res.status(201).json({ data: permission });
    } catch (error) {
      next(error);
    }
  });

  router.delete('/permissions/:name', async (req, res, next) => {
    try {
      await adminService.deletePermission(req.params.name);
      res.status(204).send();
    } catch (error) {
      next(error);
    }
  });

  router.post('/roles', async (req, res, next) => {
    try {
      const role = await adminService.createRole(req.body);
      res.status(201).json({ data: role });
    } catch (error) {
      next(error);
    }
  });

  router.delete('/roles/:id', async (req, res, next) => {
    try {
      await adminService.deleteRole(idFrom(req.params.id));
      res.status(204).send();
    } catch (error) {
      next(error);
    }
  });

  router.put('/roles/:id/permissions', async (req, res, next) => {
    try {
      const permissions = await adminService.syncRolePermissions(idFrom(req.params.id), req.body);
      res.json({ data: { permissions } });
    } catch (error) {
      next(error);
    }
  });

  router.put('/roles/:id/permissions/:name', async (req, res, next) => {
    try {
      await adminService.attachPermission(idFrom(req.params.id), req.params.name);
      res.status(204).send();
    } catch (error) {
      next(error);
    }
  });

  router.delete('/roles/:id/permissions/:name', async (req, res, next) => {
    try {
      await adminService.detachPermission(idFrom(req.params.id), req.params.name);
      res.status(204).send();
    } catch (error) {
      next(error);
    }
  });

  router.put('/users/:id/roles/:roleId', async (req, res, next) => {
    try {
      await adminService.assignRole(idFrom(req.params.id), idFrom(req.params.roleId));
      res.status(204).send();
    } catch (error) {
      next(error);
    }
  });

  router.delete('/users/:id/roles/:roleId', async (req, res, next) => {
    try {
      await adminService.revokeRole(idFrom(req.params.id), idFrom(req.params.roleId));
      res.status(204).send();
    } catch (error) {
      next(error);
    }
  });

  router.put('/users/:id/roles', async (req, res, next) => {
    try {
      const roles = await adminService.syncUserRoles(idFrom(req.params.id), req.body);
      res.json({ data: { roles } });
    } catch (error) {
      next(error);
    }
  });

  return router;
};
