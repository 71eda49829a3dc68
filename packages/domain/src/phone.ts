/**
 * Phone value object (Brazilian numbers).
 *
 * Accepts 11999999999, 5511999999999, (11) 99999-9999, +55 11 99999-9999 and landlines.
 * Stored as area code + number (10 or 11 digits), without the country code.
 */

import { ValidationError } from './errors.js';

const COUNTRY_CODE = '55';

export class Phone {
  readonly value: string;

  constructor(value: string) {
    if (!value) {
      throw new ValidationError('Telefone é obrigatório', 'phone');
    }

    let digits = value.replace(/\D/g, '');

    if (digits.length < 10 || digits.length > 13) {
      throw new ValidationError(
        `Telefone inválido: ${value}. Use formato: 11999999999`,
        'phone'
      );
    }

    if ((digits.length === 13 || digits.length === 12) && digits.startsWith(COUNTRY_CODE)) {
      digits = digits.slice(2);
    }

    const ddd = Number.parseInt(digits.slice(0, 2), 10);
    if (ddd < 11 || ddd > 99) {
      throw new ValidationError(`DDD inválido: ${ddd}`, 'phone');
    }

    this.value = digits;
    Object.freeze(this);
  }

  /**
   * Returns null instead of throwing for empty or invalid input.
   */
  static tryParse(value: string | null | undefined): Phone | null {
    if (!value) return null;
    try {
      return new Phone(value);
    } catch (error) {
      if (error instanceof ValidationError) return null;
      throw error;
    }
  }

  get ddd(): string {
    return this.value.slice(0, 2);
  }

  get number(): string {
    return this.value.slice(2);
  }

  /**
   * (XX) XXXXX-XXXX for mobiles, (XX) XXXX-XXXX for landlines.
   */
  get formatted(): string {
    if (this.value.length === 11) {
      return `(${this.ddd}) ${this.value.slice(2, 7)}-${this.value.slice(7)}`;
    }
    return `(${this.ddd}) ${this.value.slice(2, 6)}-${this.value.slice(6)}`;
  }

  get whatsapp(): string {
    return `${COUNTRY_CODE}${this.value}`;
  }

  get isMobile(): boolean {
    return this.value.length === 11 && this.value[2] === '9';
  }

  equals(other: Phone | string): boolean {
    if (other instanceof Phone) {
      return this.value === other.value;
    }
    let digits = other.replace(/\D/g, '');
    if (digits.length === 13 && digits.startsWith(COUNTRY_CODE)) {
      digits = digits.slice(2);
    }
    return this.value === digits;
  }

  toString(): string {
    return this.formatted;
  }

  toJSON(): string {
    return this.value;
  }
}
