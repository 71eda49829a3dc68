/**
 * Admin Service Tests
 */

import { beforeEach, describe, it, expect, vi } from 'vitest';
import { Company } from '@vistoria/domain/company';
import {
  BusinessRuleViolationError,
  CompanyNotFoundError,
  UnauthorizedError,
  UserNotFoundError,
} from '@vistoria/domain/errors';
import { Establishment } from '@vistoria/domain/establishment';
import { User, UserRole } from '@vistoria/domain/user';
import { AdminService } from './admin-service.js';
import type { Logger } from './logger.js';
import { createInMemoryRepositories, type Repositories } from './repositories.js';

function stubLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('AdminService', () => {
  let repos: Repositories;
  let service: AdminService;
  let admin: User;
  let company: Company;
  let manager: User;

  beforeEach(async () => {
    repos = createInMemoryRepositories();
    service = new AdminService(repos, stubLogger());
    admin = User.createAdmin({ email: 'admin@example.com', name: 'Admin' });
    company = Company.create('Rede Sabor', '12345678000190');
    manager = User.createManager({
      email: 'gestor@example.com',
      name: 'Gestor',
      companyId: company.id,
    });
    await repos.companies.save(company);
    await repos.users.save(admin);
    await repos.users.save(manager);
  });

  describe('createCompany', () => {
    it('saves a new company with a normalized CNPJ', async () => {
      const created = await service.createCompany(admin, {
        name: ' Padaria Boa ',
        cnpj: '98.765.432/0001-10',
      });

      expect(created.name).toBe('Padaria Boa');
      expect(created.cnpj).toBe('98765432000110');
      expect(await repos.companies.findById(created.id)).toBe(created);
    });

    it('refuses a CNPJ that is already registered', async () => {
      const duplicate = service.createCompany(admin, {
        name: 'Outra',
        cnpj: '12.345.678/0001-90',
      });

      await expect(duplicate).rejects.toBeInstanceOf(BusinessRuleViolationError);
      await expect(duplicate).rejects.toMatchObject({
        rule: 'DUPLICATE_CNPJ',
        message: 'Já existe uma empresa com o CNPJ 12.345.678/0001-90',
      });
    });

    it('is reserved to admins', async () => {
      await expect(service.createCompany(manager, { name: 'Nova' })).rejects.toThrow(
        'Acesso restrito a administradores'
      );
    });
  });

  describe('deleteCompany', () => {
    it('removes a company with no dependents', async () => {
      const empty = Company.create('Vazia');
      await repos.companies.save(empty);

      await service.deleteCompany(admin, empty.id);

      expect(await repos.companies.findById(empty.id)).toBeNull();
    });

    it('keeps a company that still has establishments or users', async () => {
      await repos.establishments.save(
        Establishment.create({ name: 'Loja Centro', companyId: company.id })
      );

      await expect(service.deleteCompany(admin, company.id)).rejects.toMatchObject({
        rule: 'COMPANY_HAS_DEPENDENTS',
        message: "Empresa 'Rede Sabor' possui 1 estabelecimento(s) e 1 usuário(s) vinculados",
      });
      expect(await repos.companies.findById(company.id)).toBe(company);
    });

    it('reports an unknown company', async () => {
      await expect(service.deleteCompany(admin, 'missing')).rejects.toBeInstanceOf(
        CompanyNotFoundError
      );
    });
  });

  describe('createManager', () => {
    it('creates a manager who must change the password', async () => {
      const created = await service.createManager(admin, {
        name: 'Joana',
        email: 'Joana@Example.com',
        companyId: company.id,
      });

      expect(created.role).toBe(UserRole.MANAGER);
      expect(created.companyId).toBe(company.id);
      expect(created.mustChangePassword).toBe(true);
      expect(await repos.users.findByEmail('joana@example.com')).toBe(created);
    });

    it('refuses an email that is already registered', async () => {
      await expect(
        service.createManager(admin, {
          name: 'Outro Gestor',
          email: 'GESTOR@example.com',
          companyId: company.id,
        })
      ).rejects.toMatchObject({ rule: 'DUPLICATE_EMAIL', message: 'Email já cadastrado' });
    });

    it('requires an existing, active company', async () => {
      await expect(
        service.createManager(admin, { name: 'X', email: 'x@example.com', companyId: 'missing' })
      ).rejects.toBeInstanceOf(CompanyNotFoundError);

      company.deactivate();
      await expect(
        service.createManager(admin, { name: 'X', email: 'x@example.com', companyId: company.id })
      ).rejects.toMatchObject({ rule: 'COMPANY_INACTIVE' });
    });
  });

  describe('updateManager', () => {
    it('renames a manager and changes the email', async () => {
      await service.updateManager(admin, manager.id, {
        name: 'Gestora',
        email: 'gestora@example.com',
      });

      expect(manager.name).toBe('Gestora');
      expect(await repos.users.findByEmail('gestora@example.com')).toBe(manager);
    });

    it('refuses an email owned by another user', async () => {
      await expect(
        service.updateManager(admin, manager.id, { email: 'ADMIN@example.com' })
      ).rejects.toMatchObject({ rule: 'DUPLICATE_EMAIL' });
      expect(manager.email.value).toBe('gestor@example.com');
    });

    it('only edits managers', async () => {
      await expect(service.updateManager(admin, admin.id, { name: 'X' })).rejects.toBeInstanceOf(
        UserNotFoundError
      );
    });
  });

  describe('user activation', () => {
    let consultant: User;

    beforeEach(async () => {
      consultant = User.createConsultant({
        email: 'ana@example.com',
        name: 'Ana',
        companyId: company.id,
      });
      await repos.users.save(consultant);
    });

    it('lets a manager deactivate and reactivate a user of the same company', async () => {
      await service.deactivateUser(manager, consultant.id);
      expect(consultant.isActive).toBe(false);

      await service.activateUser(manager, consultant.id);
      expect(consultant.isActive).toBe(true);
    });

    it('keeps managers out of other companies', async () => {
      const outsider = User.createManager({
        email: 'outro@example.com',
        name: 'Outro',
        companyId: 'company-2',
      });

      await expect(service.deactivateUser(outsider, consultant.id)).rejects.toBeInstanceOf(
        UnauthorizedError
      );
      expect(consultant.isActive).toBe(true);
    });

    it('does not let consultants manage users', async () => {
      await expect(service.deactivateUser(consultant, manager.id)).rejects.toThrow(
        'Apenas gestores podem gerenciar usuários'
      );
    });

    it('refuses self-deactivation', async () => {
      await expect(service.deactivateUser(manager, manager.id)).rejects.toMatchObject({
        rule: 'SELF_DEACTIVATION',
      });
    });

    it('reports an unknown user', async () => {
      await expect(service.activateUser(admin, 'missing')).rejects.toBeInstanceOf(
        UserNotFoundError
      );
    });
  });

  describe('assignConsultant', () => {
    it('links the consultant and the establishment both ways', async () => {
      const consultant = User.createConsultant({
        email: 'ana@example.com',
        name: 'Ana',
        companyId: company.id,
      });
      const establishment = Establishment.create({ name: 'Loja Centro', companyId: company.id });
      await repos.users.save(consultant);
      await repos.establishments.save(establishment);

      await service.assignConsultant(manager, consultant.id, establishment.id);

      expect(consultant.canAccessEstablishment(establishment.id)).toBe(true);
      expect(establishment.consultantIds).toEqual([consultant.id]);
    });

    it('only assigns consultants', async () => {
      const establishment = Establishment.create({ name: 'Loja Centro', companyId: company.id });
      await repos.establishments.save(establishment);

      await expect(
        service.assignConsultant(admin, manager.id, establishment.id)
      ).rejects.toThrow('Apenas consultores podem ser atribuídos a estabelecimentos');
      expect(establishment.consultantIds).toEqual([]);
    });
  });
});
