/**
 * Persistence contracts for the workflow services, plus in-memory implementations
 * used by tests and local runs. Only repositories rehydrate entities with existing ids.
 */

import type { ActionPlan } from '@vistoria/domain/action-plan';
import { normalizeCnpj, type Company } from '@vistoria/domain/company';
import type { Establishment } from '@vistoria/domain/establishment';
import type { Inspection } from '@vistoria/domain/inspection';
import type { User } from '@vistoria/domain/user';
import type {
  CompanyId,
  ContentHash,
  EntityId,
  EstablishmentId,
  InspectionId,
  UserId,
} from '@vistoria/domain/types';

export interface InspectionRepository {
  findById(id: InspectionId): Promise<Inspection | null>;
  findByDriveFileId(driveFileId: string): Promise<Inspection | null>;
  findByFileHash(fileHash: ContentHash): Promise<Inspection[]>;
  save(inspection: Inspection): Promise<void>;
  delete(id: InspectionId): Promise<void>;
}

export interface ActionPlanRepository {
  findById(id: EntityId): Promise<ActionPlan | null>;
  findByInspectionId(inspectionId: InspectionId): Promise<ActionPlan | null>;
  save(plan: ActionPlan): Promise<void>;
}

export interface EstablishmentRepository {
  findById(id: EstablishmentId): Promise<Establishment | null>;
  findByCompanyId(companyId: CompanyId): Promise<Establishment[]>;
  save(establishment: Establishment): Promise<void>;
}

export interface UserRepository {
  findById(id: UserId): Promise<User | null>;
  findByEmail(email: string): Promise<User | null>;
  findByCompanyId(companyId: CompanyId): Promise<User[]>;
  save(user: User): Promise<void>;
}

export interface CompanyRepository {
  findById(id: CompanyId): Promise<Company | null>;
  findByCnpj(cnpj: string): Promise<Company | null>;
  save(company: Company): Promise<void>;
  delete(id: CompanyId): Promise<void>;
}

export interface Repositories {
  inspections: InspectionRepository;
  actionPlans: ActionPlanRepository;
  establishments: EstablishmentRepository;
  users: UserRepository;
  companies: CompanyRepository;
}

class InMemoryStore<T extends { id: EntityId }> {
  protected records = new Map<EntityId, T>();

  async findById(id: EntityId): Promise<T | null> {
    return this.records.get(id) ?? null;
  }

  async save(record: T): Promise<void> {
    this.records.set(record.id, record);
  }

  protected find(predicate: (record: T) => boolean): T | null {
    for (const record of this.records.values()) {
      if (predicate(record)) return record;
    }
    return null;
  }

  protected filter(predicate: (record: T) => boolean): T[] {
    return [...this.records.values()].filter(predicate);
  }
}

export class InMemoryInspectionRepository
  extends InMemoryStore<Inspection>
  implements InspectionRepository
{
  async findByDriveFileId(driveFileId: string): Promise<Inspection | null> {
    return this.find((inspection) => inspection.driveFileId === driveFileId);
  }

  async findByFileHash(fileHash: ContentHash): Promise<Inspection[]> {
    return this.filter((inspection) => inspection.isDuplicateOf(fileHash));
  }

  async delete(id: InspectionId): Promise<void> {
    this.records.delete(id);
  }
}

export class InMemoryActionPlanRepository
  extends InMemoryStore<ActionPlan>
  implements ActionPlanRepository
{
  async findByInspectionId(inspectionId: InspectionId): Promise<ActionPlan | null> {
    return this.find((plan) => plan.inspectionId === inspectionId);
  }
}

export class InMemoryEstablishmentRepository
  extends InMemoryStore<Establishment>
  implements EstablishmentRepository
{
  async findByCompanyId(companyId: CompanyId): Promise<Establishment[]> {
    return this.filter((establishment) => establishment.companyId === companyId);
  }
}

export class InMemoryUserRepository extends InMemoryStore<User> implements UserRepository {
  async findByEmail(email: string): Promise<User | null> {
    return this.find((user) => user.email.equals(email));
  }

  async findByCompanyId(companyId: CompanyId): Promise<User[]> {
    return this.filter((user) => user.companyId === companyId);
  }
}

export class InMemoryCompanyRepository
  extends InMemoryStore<Company>
  implements CompanyRepository
{
  async findByCnpj(cnpj: string): Promise<Company | null> {
    const digits = normalizeCnpj(cnpj);
    return this.find((company) => company.cnpj === digits);
  }

  async delete(id: CompanyId): Promise<void> {
    this.records.delete(id);
  }
}

export function createInMemoryRepositories(): Repositories {
  return {
    inspections: new InMemoryInspectionRepository(),
    actionPlans: new InMemoryActionPlanRepository(),
    establishments: new InMemoryEstablishmentRepository(),
    users: new InMemoryUserRepository(),
    companies: new InMemoryCompanyRepository(),
  };
}
