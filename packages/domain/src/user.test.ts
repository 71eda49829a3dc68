/**
 * User Entity Tests
 */

import { describe, it, expect } from 'vitest';
import { User, UserRole, ROLE_CAPABILITIES, roleLabel } from './user.js';
import { Company } from './company.js';
import { Email } from './email.js';
import { BusinessRuleViolationError, ValidationError } from './errors.js';

describe('User Entity', () => {
  const companyId = 'company-1';

  describe('factories', () => {
    it('creates consultants that must change their password', () => {
      const user = User.createConsultant({
        email: 'Consultor@Rede.com',
        name: 'Ana',
        companyId,
      });

      expect(user.role).toBe(UserRole.CONSULTANT);
      expect(user.email.value).toBe('consultor@rede.com');
      expect(user.mustChangePassword).toBe(true);
      expect(user.isActive).toBe(true);
      expect(user.companyId).toBe(companyId);
      expect(user.id).toBeTruthy();
      expect(user.updatedAt).toBeNull();
    });

    it('creates managers and admins', () => {
      const manager = User.createManager({ email: 'gestor@rede.com', name: 'Bia', companyId });
      const admin = User.createAdmin({ email: 'admin@rede.com', name: 'Caio' });

      expect(manager.isManager).toBe(true);
      expect(manager.mustChangePassword).toBe(true);
      expect(admin.isAdmin).toBe(true);
      expect(admin.companyId).toBeNull();
    });

    it('rejects an invalid email', () => {
      expect(() => User.createAdmin({ email: 'nope', name: 'X' })).toThrow(ValidationError);
    });
  });

  describe('activation', () => {
    it('rejects double deactivation', () => {
      const user = User.createManager({ email: 'g@rede.com', name: 'G', companyId });

      user.deactivate();
      expect(user.isActive).toBe(false);
      expect(user.updatedAt).not.toBeNull();

      expect(() => user.deactivate()).toThrow(BusinessRuleViolationError);
      expect(() => user.deactivate()).toThrow('Usuário já está inativo');
    });

    it('rejects activating an active user', () => {
      const user = User.createManager({ email: 'g@rede.com', name: 'G', companyId });

      expect(() => user.activate()).toThrow('Usuário já está ativo');

      user.deactivate();
      user.activate();
      expect(user.isActive).toBe(true);
    });
  });

  describe('establishment access', () => {
    it('assigns an establishment only once', () => {
      const user = User.createConsultant({ email: 'c@rede.com', name: 'C', companyId });

      user.assignEstablishment('est-1');
      user.assignEstablishment('est-1');

      expect(user.establishmentIds).toEqual(['est-1']);
      expect(user.canAccessEstablishment('est-1')).toBe(true);
      expect(user.canAccessEstablishment('est-2')).toBe(false);
    });

    it('clears assignments when leaving the consultant role', () => {
      const user = User.createConsultant({ email: 'c@rede.com', name: 'C', companyId });
      user.assignEstablishment('est-1');
      user.assignEstablishment('est-2');

      user.changeRole(UserRole.MANAGER);

      expect(user.role).toBe(UserRole.MANAGER);
      expect(user.establishmentIds).toEqual([]);
      expect(user.canAccessEstablishment('est-1')).toBe(false);
    });

    it('does not touch updatedAt when the role is unchanged', () => {
      const user = User.createConsultant({ email: 'c@rede.com', name: 'C', companyId });

      user.changeRole(UserRole.CONSULTANT);

      expect(user.updatedAt).toBeNull();
      expect(user.version).toBe(0);
    });

    it('refuses to assign establishments to non-consultants', () => {
      const manager = User.createManager({ email: 'g@rede.com', name: 'G', companyId });

      expect(() => manager.assignEstablishment('est-1')).toThrow(BusinessRuleViolationError);
    });

    it('lets admins access any establishment', () => {
      const admin = User.createAdmin({ email: 'admin@rede.com', name: 'A' });
      expect(admin.canAccessEstablishment('anything')).toBe(true);
    });

    it('ignores removal of an unassigned establishment', () => {
      const user = User.createConsultant({
        email: 'c@rede.com',
        name: 'C',
        companyId,
        establishmentIds: ['est-1'],
      });

      user.removeEstablishment('est-9');
      expect(user.establishmentIds).toEqual(['est-1']);
      expect(user.updatedAt).toBeNull();

      user.removeEstablishment('est-1');
      expect(user.establishmentIds).toEqual([]);
    });

    it('returns a copy of the assignment list', () => {
      const user = User.createConsultant({ email: 'c@rede.com', name: 'C', companyId });
      user.assignEstablishment('est-1');

      user.establishmentIds.push('est-evil');

      expect(user.canAccessEstablishment('est-evil')).toBe(false);
    });
  });

  describe('role capabilities', () => {
    it('derives capabilities from the role table', () => {
      expect(ROLE_CAPABILITIES[UserRole.CONSULTANT].canApprovePlans).toBe(false);
      expect(ROLE_CAPABILITIES[UserRole.MANAGER].canApprovePlans).toBe(true);
      expect(ROLE_CAPABILITIES[UserRole.MANAGER].canAccessAdmin).toBe(false);
      expect(ROLE_CAPABILITIES[UserRole.ADMIN].canAccessAdmin).toBe(true);
      expect(roleLabel(UserRole.MANAGER)).toBe('Gestor');
    });

    it('exposes capabilities on the entity', () => {
      const consultant = User.createConsultant({ email: 'c@rede.com', name: 'C', companyId });
      expect(consultant.canApprovePlans).toBe(false);
      expect(consultant.canManageUsers).toBe(false);

      consultant.changeRole(UserRole.ADMIN);
      expect(consultant.canApprovePlans).toBe(true);
      expect(consultant.canAccessAdmin).toBe(true);
    });
  });

  it('falls back to the email for display', () => {
    const user = new User({ email: new Email('sem.nome@rede.com') });
    expect(user.displayName).toBe('sem.nome@rede.com');
    expect(user.toString()).toBe('User(sem.nome@rede.com, Consultor)');
  });

  it('compares by identity', () => {
    const a = new User({ email: new Email('a@rede.com') }, { id: 'u-1', createdAt: '2024-01-01T00:00:00.000Z' });
    const b = new User({ email: new Email('b@rede.com'), name: 'Other' }, { id: 'u-1', createdAt: '2024-02-01T00:00:00.000Z' });
    const c = new User({ email: new Email('a@rede.com') });

    expect(a.equals(b)).toBe(true);
    expect(a.equals(c)).toBe(false);
  });

  it('treats any entity with the same id as equal', () => {
    const snapshot = { id: 'shared-1', createdAt: '2024-01-01T00:00:00.000Z' };
    const user = new User({ email: new Email('a@rede.com') }, snapshot);
    const company = new Company({ name: 'Rede' }, snapshot);

    expect(user.equals(company)).toBe(true);
    expect(user.equals({ id: 'shared-1' })).toBe(false);
  });

  it('updates the profile only when every field is valid', () => {
    const user = User.createManager({ email: 'g@rede.com', name: 'G', companyId });

    expect(() => user.updateProfile({ name: 'Novo', email: 'invalido' })).toThrow(ValidationError);
    expect(user.name).toBe('G');

    user.updateProfile({ name: '  ', email: 'Novo@Rede.com' });
    expect(user.name).toBeNull();
    expect(user.email.value).toBe('novo@rede.com');
  });

  it('toggles the password flag', () => {
    const user = User.createManager({ email: 'g@rede.com', name: 'G', companyId });
    user.passwordChanged();
    expect(user.mustChangePassword).toBe(false);
    user.requirePasswordChange();
    expect(user.mustChangePassword).toBe(true);
    expect(user.version).toBe(2);
  });
});
