/**
 * Shared identifier and timestamp aliases for the inspection domain.
 */

export type EntityId = string;
export type UserId = EntityId;
export type CompanyId = EntityId;
export type EstablishmentId = EntityId;
export type InspectionId = EntityId;
export type ActionPlanId = EntityId;
export type ActionPlanItemId = EntityId;

export type ISOTimestamp = string; // ISO 8601
export type ISODate = string; // YYYY-MM-DD
export type ContentHash = string; // SHA-256 hex

/**
 * Identity fields a persistence collaborator supplies when rehydrating an entity.
 */
export interface EntitySnapshot {
  id: EntityId;
  createdAt: ISOTimestamp;
  updatedAt?: ISOTimestamp | null;
  version?: number;
}
