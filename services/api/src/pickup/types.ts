import type {
  AuthorizationLevel,
  AuthorizedPickup,
  PickupLogEntry,
  PickupPerson,
  PickupRelationship,
} from '@roomsafe/shared';

export interface NewAuthorizedPickup {
  childId: string;
  authorizedPersonId: string | null;
  name: string | null;
  phoneNumber: string | null;
  relationship: PickupRelationship;
  authorizationLevel: AuthorizationLevel;
  photoUrl: string | null;
  custodyNotes: string | null;
}

export type AuthorizedPickupPatch = Partial<
  Pick<
    AuthorizedPickup,
    'name' | 'phoneNumber' | 'relationship' | 'authorizationLevel' | 'photoUrl' | 'custodyNotes'
  >
>;

export type NewPickupLog = Omit<PickupLogEntry, 'id'>;

export interface PickupLogRange {
  from: Date | null;
  /** Exclusive upper bound. */
  to: Date | null;
}

export interface PickupStore {
  listAuthorizedPickups(
    childId: string,
    opts: { includeInactive: boolean }
  ): Promise<AuthorizedPickup[]>;
  getAuthorizedPickup(id: string): Promise<AuthorizedPickup | null>;
  /** Named people match on trimmed, case-insensitive name. */
  findActiveAuthorization(childId: string, person: PickupPerson): Promise<AuthorizedPickup | null>;
  /** Throws InvalidOperationError when an active entry already exists for the pair. */
  insertAuthorizedPickup(input: NewAuthorizedPickup, now: Date): Promise<AuthorizedPickup>;
  updateAuthorizedPickup(
    id: string,
    patch: AuthorizedPickupPatch,
    now: Date
  ): Promise<AuthorizedPickup | null>;
  deactivateAuthorizedPickup(id: string, now: Date): Promise<AuthorizedPickup | null>;
  /**
   * Inserts unless an active entry exists for (child, person). Returns true
   * when a row was created.
   */
  upsertStandingAuthorization(input: NewAuthorizedPickup, now: Date): Promise<boolean>;
  /**
   * Appends the log and closes the attendance if still open, atomically.
   * Returns null when the attendance already has a pickup log.
   */
  recordPickup(entry: NewPickupLog): Promise<PickupLogEntry | null>;
  getPickupLogForAttendance(attendanceId: string): Promise<PickupLogEntry | null>;
  /** Most recent first. */
  listPickupLogs(childId: string, range: PickupLogRange): Promise<PickupLogEntry[]>;
}
