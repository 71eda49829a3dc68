/**
 * Admin Service
 *
 * Client companies and their managers. Admins manage every company and its managers;
 * managers may activate, deactivate and assign the users of their own company.
 */

import { Company } from '@vistoria/domain/company';
import {
  BusinessRuleViolationError,
  CompanyNotFoundError,
  EstablishmentNotFoundError,
  UnauthorizedError,
  UserNotFoundError,
} from '@vistoria/domain/errors';
import type { CompanyId, EstablishmentId, UserId } from '@vistoria/domain/types';
import { User } from '@vistoria/domain/user';
import type { Logger } from './logger.js';
import type { Repositories } from './repositories.js';

export interface CreateManagerInput {
  name: string;
  email: string;
  companyId: CompanyId;
}

export class AdminService {
  constructor(
    private readonly repos: Repositories,
    private readonly logger: Logger
  ) {}

  async createCompany(actor: User, input: { name: string; cnpj?: string }): Promise<Company> {
    this.requireAdmin(actor);

    const company = Company.create(input.name, input.cnpj);
    if (company.cnpj && (await this.repos.companies.findByCnpj(company.cnpj))) {
      throw new BusinessRuleViolationError(
        `Já existe uma empresa com o CNPJ ${company.cnpjFormatted}`,
        'DUPLICATE_CNPJ'
      );
    }

    await this.repos.companies.save(company);
    this.logger.info('Company created', { companyId: company.id, actorId: actor.id });
    return company;
  }

  /**
   * Only a company with no establishments and no users can go; nothing cascades.
   */
  async deleteCompany(actor: User, companyId: CompanyId): Promise<void> {
    this.requireAdmin(actor);

    const company = await this.repos.companies.findById(companyId);
    if (!company) {
      throw new CompanyNotFoundError(companyId);
    }

    const [establishments, users] = await Promise.all([
      this.repos.establishments.findByCompanyId(companyId),
      this.repos.users.findByCompanyId(companyId),
    ]);
    company.setCounts({ establishments: establishments.length, users: users.length });
    if (!company.canBeDeleted()) {
      throw new BusinessRuleViolationError(
        `Empresa '${company.name}' possui ${company.establishmentCount} estabelecimento(s) e ${company.userCount} usuário(s) vinculados`,
        'COMPANY_HAS_DEPENDENTS'
      );
    }

    await this.repos.companies.delete(companyId);
    this.logger.info('Company deleted', { companyId, actorId: actor.id });
  }

  async createManager(actor: User, input: CreateManagerInput): Promise<User> {
    this.requireAdmin(actor);

    const company = await this.repos.companies.findById(input.companyId);
    if (!company) {
      throw new CompanyNotFoundError(input.companyId);
    }
    if (!company.isActive) {
      throw new BusinessRuleViolationError(
        `Empresa '${company.name}' está inativa`,
        'COMPANY_INACTIVE'
      );
    }

    const manager = User.createManager(input);
    if (await this.repos.users.findByEmail(manager.email.value)) {
      throw new BusinessRuleViolationError('Email já cadastrado', 'DUPLICATE_EMAIL');
    }

    await this.repos.users.save(manager);
    this.logger.info('Manager created', { userId: manager.id, companyId: company.id });
    return manager;
  }

  async updateManager(
    actor: User,
    userId: UserId,
    changes: { name?: string; email?: string }
  ): Promise<User> {
    this.requireAdmin(actor);

    const manager = await this.repos.users.findById(userId);
    if (!manager || !manager.isManager) {
      throw new UserNotFoundError(userId);
    }
    if (changes.email !== undefined && !manager.email.equals(changes.email)) {
      const owner = await this.repos.users.findByEmail(changes.email);
      if (owner && owner.id !== manager.id) {
        throw new BusinessRuleViolationError('Email já cadastrado', 'DUPLICATE_EMAIL');
      }
    }

    manager.updateProfile(changes);
    await this.repos.users.save(manager);
    this.logger.info('Manager updated', { userId, actorId: actor.id });
    return manager;
  }

  async deactivateUser(actor: User, userId: UserId): Promise<User> {
    const user = await this.requireManagedUser(actor, userId);
    if (user.id === actor.id) {
      throw new BusinessRuleViolationError(
        'Não é possível desativar o próprio usuário',
        'SELF_DEACTIVATION'
      );
    }

    user.deactivate();
    await this.repos.users.save(user);
    this.logger.info('User deactivated', { userId, actorId: actor.id });
    return user;
  }

  async activateUser(actor: User, userId: UserId): Promise<User> {
    const user = await this.requireManagedUser(actor, userId);

    user.activate();
    await this.repos.users.save(user);
    this.logger.info('User activated', { userId, actorId: actor.id });
    return user;
  }

  async assignConsultant(
    actor: User,
    userId: UserId,
    establishmentId: EstablishmentId
  ): Promise<User> {
    const user = await this.requireManagedUser(actor, userId);
    const establishment = await this.repos.establishments.findById(establishmentId);
    if (!establishment) {
      throw new EstablishmentNotFoundError(establishmentId);
    }
    if (!actor.isAdmin && establishment.companyId !== actor.companyId) {
      throw new UnauthorizedError();
    }

    user.assignEstablishment(establishment.id);
    establishment.assignConsultant(user.id);
    await this.repos.users.save(user);
    await this.repos.establishments.save(establishment);
    this.logger.info('Consultant assigned', { userId, establishmentId });
    return user;
  }

  private requireAdmin(actor: User): void {
    if (!actor.isActive || !actor.canAccessAdmin) {
      throw new UnauthorizedError('Acesso restrito a administradores');
    }
  }

  private async requireManagedUser(actor: User, userId: UserId): Promise<User> {
    if (!actor.isActive || !actor.canManageUsers) {
      throw new UnauthorizedError('Apenas gestores podem gerenciar usuários');
    }

    const user = await this.repos.users.findById(userId);
    if (!user) {
      throw new UserNotFoundError(userId);
    }
    if (!actor.isAdmin && (actor.companyId === null || user.companyId !== actor.companyId)) {
      throw new UnauthorizedError();
    }
    return user;
  }
}
