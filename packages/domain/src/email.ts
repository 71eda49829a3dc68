/**
 * Email value object.
 * Trimmed and lower-cased once at construction; immutable afterwards.
 */

import { ValidationError } from './errors.js';

// Simplified RFC 5322
const EMAIL_PATTERN = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;

export class Email {
  readonly value: string;

  constructor(value: string) {
    if (!value) {
      throw new ValidationError('Email é obrigatório', 'email');
    }

    const normalized = value.trim().toLowerCase();
    if (!EMAIL_PATTERN.test(normalized)) {
      throw new ValidationError(`Email inválido: ${value}`, 'email');
    }

    this.value = normalized;
    Object.freeze(this);
  }

  get domain(): string {
    return this.value.split('@')[1] ?? '';
  }

  get localPart(): string {
    return this.value.split('@')[0] ?? '';
  }

  equals(other: Email | string): boolean {
    if (other instanceof Email) {
      return this.value === other.value;
    }
    return this.value === other.trim().toLowerCase();
  }

  toString(): string {
    return this.value;
  }

  toJSON(): string {
    return this.value;
  }
}
