/**
 * Entity base
 *
 * Identity plus lifecycle timestamps. Two entities are equal when their ids match,
 * whatever their other fields hold. `version` grows on every update so a persistence
 * collaborator can apply optimistic concurrency.
 */

import { randomUUID } from 'node:crypto';
import type { EntityId, EntitySnapshot, ISOTimestamp } from './types.js';

export abstract class Entity {
  readonly id: EntityId;
  readonly createdAt: ISOTimestamp;
  private _updatedAt: ISOTimestamp | null;
  private _version: number;

  protected constructor(snapshot?: EntitySnapshot) {
    this.id = snapshot?.id ?? randomUUID();
    this.createdAt = snapshot?.createdAt ?? new Date().toISOString();
    this._updatedAt = snapshot?.updatedAt ?? null;
    this._version = snapshot?.version ?? 0;
  }

  get updatedAt(): ISOTimestamp | null {
    return this._updatedAt;
  }

  get version(): number {
    return this._version;
  }

  markUpdated(): void {
    this._updatedAt = new Date().toISOString();
    this._version += 1;
  }

  equals(other: unknown): boolean {
    return other instanceof Entity && other.id === this.id;
  }
}
