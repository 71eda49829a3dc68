/**
 * Establishment Entity
 *
 * A single food-service unit of a company. Owns its contacts and the list of
 * consultants assigned to it; both change only through the add/remove methods.
 */

import { Entity } from './entity.js';
import { Email } from './email.js';
import { Phone } from './phone.js';
import { BusinessRuleViolationError, ValidationError } from './errors.js';
import type { CompanyId, EntitySnapshot, UserId } from './types.js';

export interface ContactProps {
  name: string;
  phone: Phone;
  email?: Email | null;
  role?: string | null; // e.g. Gerente, Dono
  isActive?: boolean;
}

export class Contact {
  readonly name: string;
  readonly phone: Phone;
  readonly email: Email | null;
  readonly role: string | null;
  readonly isActive: boolean;

  constructor(props: ContactProps) {
    if (!props.name || !props.name.trim()) {
      throw new ValidationError('Nome do contato é obrigatório', 'name');
    }
    this.name = props.name.trim();
    this.phone = props.phone;
    this.email = props.email ?? null;
    this.role = props.role ?? null;
    this.isActive = props.isActive ?? true;
    Object.freeze(this);
  }

  deactivate(): Contact {
    return new Contact({
      name: this.name,
      phone: this.phone,
      email: this.email,
      role: this.role,
      isActive: false,
    });
  }

  equals(other: Contact): boolean {
    return this.name === other.name && this.phone.equals(other.phone);
  }
}

function toEmail(value: string | Email): Email | null {
  if (value instanceof Email) return value;
  return value ? new Email(value) : null;
}

function toPhone(value: string | Phone): Phone | null {
  if (value instanceof Phone) return value;
  return value ? new Phone(value) : null;
}

export interface EstablishmentProps {
  name: string;
  companyId?: CompanyId | null;
  code?: string | null;
  driveFolderId?: string | null;
  isActive?: boolean;
  responsibleName?: string | null;
  responsibleEmail?: Email | null;
  responsiblePhone?: Phone | null;
  contacts?: Contact[];
  consultantIds?: UserId[];
}

export class Establishment extends Entity {
  name: string;
  companyId: CompanyId | null;
  code: string | null;
  driveFolderId: string | null;
  isActive: boolean;
  responsibleName: string | null;
  responsibleEmail: Email | null;
  responsiblePhone: Phone | null;
  private _contacts: Contact[];
  private _consultantIds: UserId[];

  constructor(props: EstablishmentProps, snapshot?: EntitySnapshot) {
    super(snapshot);
    if (!props.name || !props.name.trim()) {
      throw new ValidationError('Nome do estabelecimento é obrigatório', 'name');
    }
    this.name = props.name.trim();
    this.companyId = props.companyId ?? null;
    this.code = props.code ? props.code.trim().toUpperCase() : null;
    this.driveFolderId = props.driveFolderId ?? null;
    this.isActive = props.isActive ?? true;
    this.responsibleName = props.responsibleName ?? null;
    this.responsibleEmail = props.responsibleEmail ?? null;
    this.responsiblePhone = props.responsiblePhone ?? null;
    this._contacts = [...(props.contacts ?? [])];
    this._consultantIds = [...new Set(props.consultantIds ?? [])];
  }

  static create(input: {
    name: string;
    companyId: CompanyId;
    code?: string;
    responsibleName?: string;
    responsibleEmail?: string;
    responsiblePhone?: string;
  }): Establishment {
    return new Establishment({
      name: input.name,
      companyId: input.companyId,
      code: input.code,
      responsibleName: input.responsibleName,
      responsibleEmail: input.responsibleEmail ? new Email(input.responsibleEmail) : null,
      responsiblePhone: input.responsiblePhone ? new Phone(input.responsiblePhone) : null,
    });
  }

  get hasDriveFolder(): boolean {
    return Boolean(this.driveFolderId);
  }

  get hasResponsible(): boolean {
    return Boolean(this.responsibleName);
  }

  get canSendWhatsapp(): boolean {
    return this.responsiblePhone !== null;
  }

  get canSendEmail(): boolean {
    return this.responsibleEmail !== null;
  }

  get contacts(): Contact[] {
    return [...this._contacts];
  }

  get activeContacts(): Contact[] {
    return this._contacts.filter((contact) => contact.isActive);
  }

  get consultantIds(): UserId[] {
    return [...this._consultantIds];
  }

  setDriveFolder(folderId: string): void {
    if (!folderId) {
      throw new ValidationError('ID da pasta do Drive não pode ser vazio', 'drive_folder_id');
    }
    this.driveFolderId = folderId;
    this.markUpdated();
  }

  /**
   * Undefined leaves a field alone; an empty string clears it.
   * Email and phone are parsed before anything is assigned.
   */
  updateResponsible(changes: {
    name?: string;
    email?: string | Email;
    phone?: string | Phone;
  }): void {
    const email = changes.email === undefined ? this.responsibleEmail : toEmail(changes.email);
    const phone = changes.phone === undefined ? this.responsiblePhone : toPhone(changes.phone);

    if (changes.name !== undefined) {
      this.responsibleName = changes.name.trim() || null;
    }
    this.responsibleEmail = email;
    this.responsiblePhone = phone;
    this.markUpdated();
  }

  addContact(contact: Contact): void {
    this._contacts.push(contact);
    this.markUpdated();
  }

  removeContact(contact: Contact): void {
    const index = this._contacts.findIndex((existing) => existing.equals(contact));
    if (index >= 0) {
      this._contacts.splice(index, 1);
      this.markUpdated();
    }
  }

  assignConsultant(consultantId: UserId): void {
    if (!this._consultantIds.includes(consultantId)) {
      this._consultantIds.push(consultantId);
      this.markUpdated();
    }
  }

  removeConsultant(consultantId: UserId): void {
    const index = this._consultantIds.indexOf(consultantId);
    if (index >= 0) {
      this._consultantIds.splice(index, 1);
      this.markUpdated();
    }
  }

  deactivate(): void {
    if (!this.isActive) {
      throw new BusinessRuleViolationError('Estabelecimento já está inativo');
    }
    this.isActive = false;
    this.markUpdated();
  }

  activate(): void {
    if (this.isActive) {
      throw new BusinessRuleViolationError('Estabelecimento já está ativo');
    }
    this.isActive = true;
    this.markUpdated();
  }

  updateInfo(changes: { name?: string; code?: string | null }): void {
    if (changes.name !== undefined) {
      if (!changes.name.trim()) {
        throw new ValidationError('Nome do estabelecimento não pode ser vazio', 'name');
      }
      this.name = changes.name.trim();
    }

    if (changes.code !== undefined) {
      this.code = changes.code ? changes.code.trim().toUpperCase() : null;
    }

    this.markUpdated();
  }

  toString(): string {
    return `Establishment(${this.name}${this.code ? ` (${this.code})` : ''})`;
  }
}
