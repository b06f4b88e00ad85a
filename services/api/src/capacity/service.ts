import type { Logger } from 'pino';
import {
  computeCapacitySnapshot,
  computeStaffRatio,
  isAtCapacity,
  isUuid,
  type CapacitySettings,
  type LocationCapacity,
  type LocationSummary,
  type OverflowSuggestion,
} from '@roomsafe/shared';
import type { OperationOptions } from '../checkin/service.js';
import type { AttendanceRecord, AttendanceStore } from '../checkin/types.js';
import type { Directory, LocationRecord, LocationSettingsStore } from '../directory/types.js';
import { ArgumentError, InvalidIdError, NotFoundError } from '../errors/domain.js';
import type { Clock } from '../time/clock.js';

export interface CapacityServiceDeps {
  directory: Directory;
  attendance: AttendanceStore;
  locationSettings: LocationSettingsStore;
  clock: Clock;
  logger: Logger;
  capacityWarningPercent?: number;
}

interface OccupancyContext {
  open: AttendanceRecord[];
  rostered: Set<string>;
  overflowById: Map<string, LocationRecord>;
}

function toLocationSummary(location: Pick<LocationRecord, 'id' | 'name'>): LocationSummary {
  return { id: location.id, name: location.name };
}

function rosterKey(locationId: string, personId: string): string {
  return `${locationId}:${personId}`;
}

/**
 * Occupancy reporting, overflow routing, staff ratios and capacity settings.
 * Admission itself is decided under the location lock by the check-in service.
 */
export class CapacityService {
  constructor(private readonly deps: CapacityServiceDeps) {}

  async getLocationCapacity(
    locationId: string,
    occurrenceDate?: string,
    opts: OperationOptions = {}
  ): Promise<LocationCapacity> {
    const location = await this.requireLocation(locationId, opts);
    const date = occurrenceDate ?? this.deps.clock.today();
    const context = await this.loadContext([location], date);
    return this.summarize(location, date, context);
  }

  /**
   * Capacity for several locations in one pass, in request order. Malformed
   * and unknown ids are skipped.
   */
  async getMultipleLocationCapacities(
    locationIds: readonly string[],
    occurrenceDate?: string,
    opts: OperationOptions = {}
  ): Promise<LocationCapacity[]> {
    const ids = [...new Set(locationIds.filter(isUuid).map((id) => id.toLowerCase()))];
    if (ids.length === 0) return [];
    opts.signal?.throwIfAborted();

    const found = await this.deps.directory.getLocations(ids);
    const byId = new Map(found.map((location) => [location.id, location]));
    const locations = ids.flatMap((id) => {
      const location = byId.get(id);
      return location ? [location] : [];
    });

    const date = occurrenceDate ?? this.deps.clock.today();
    const context = await this.loadContext(locations, date);
    this.deps.logger.info({ requested: locationIds.length, found: locations.length }, 'Loaded location capacities');
    return locations.map((location) => this.summarize(location, date, context));
  }

  /**
   * Capacity of the location's overflow location, or null when none is set.
   */
  async getOverflowLocationCapacity(
    locationId: string,
    occurrenceDate?: string,
    opts: OperationOptions = {}
  ): Promise<LocationCapacity | null> {
    const location = await this.requireLocation(locationId, opts);
    if (!location.overflowLocationId) return null;

    const overflow = await this.deps.directory.getLocation(location.overflowLocationId);
    if (!overflow) return null;

    const date = occurrenceDate ?? this.deps.clock.today();
    const context = await this.loadContext([overflow], date);
    return this.summarize(overflow, date, context);
  }

  /**
   * True when the staff on duty cover the children present, or no ratio is set.
   */
  async validateStaffRatio(
    locationId: string,
    occurrenceDate?: string,
    opts: OperationOptions = {}
  ): Promise<boolean> {
    const capacity = await this.getLocationCapacity(locationId, occurrenceDate, opts);
    if (!capacity.meetsStaffRatio) {
      this.deps.logger.warn(
        {
          locationId,
          currentStaffCount: capacity.currentStaffCount,
          requiredStaffCount: capacity.requiredStaffCount,
        },
        'Staff ratio not met'
      );
    }
    return capacity.meetsStaffRatio;
  }

  /**
   * Overflow for a full location, when it routes attendees automatically.
   */
  async suggestOverflow(location: LocationRecord, occurrenceDate: string): Promise<OverflowSuggestion | null> {
    if (!location.autoAssignOverflow || !location.overflowLocationId) return null;

    const overflow = await this.deps.directory.getLocation(location.overflowLocationId);
    if (!overflow) return null;

    const occupancy = await this.deps.attendance.countOpenAttendances(overflow.id, occurrenceDate);
    const snapshot = computeCapacitySnapshot(overflow, occupancy, this.deps.capacityWarningPercent);
    return {
      location: toLocationSummary(overflow),
      capacityStatus: snapshot.capacityStatus,
      canAccept: overflow.isActive && !isAtCapacity(overflow, occupancy),
    };
  }

  /**
   * Replaces the capacity settings of a location and returns today's capacity.
   */
  async updateCapacitySettings(
    locationId: string,
    settings: CapacitySettings,
    opts: OperationOptions = {}
  ): Promise<LocationCapacity> {
    if (!isUuid(locationId)) {
      throw new InvalidIdError('location ID');
    }
    const { softCapacity, hardCapacity, staffToChildRatio, overflowLocationId } = settings;
    if (softCapacity !== null && hardCapacity !== null && softCapacity > hardCapacity) {
      throw new ArgumentError('Soft capacity must be less than or equal to hard capacity');
    }
    if (staffToChildRatio !== null && (!Number.isInteger(staffToChildRatio) || staffToChildRatio < 1)) {
      throw new ArgumentError('Staff-to-child ratio must be a positive integer');
    }

    if (overflowLocationId !== null) {
      if (!isUuid(overflowLocationId)) {
        throw new InvalidIdError('overflow location ID');
      }
      if (overflowLocationId.toLowerCase() === locationId.toLowerCase()) {
        throw new ArgumentError('A location cannot overflow into itself');
      }
      if (!(await this.deps.directory.getLocation(overflowLocationId))) {
        throw new ArgumentError('Overflow location not found');
      }
    }

    opts.signal?.throwIfAborted();
    const updated = await this.deps.locationSettings.updateCapacitySettings(locationId, settings);
    if (!updated) {
      throw new NotFoundError('Location not found');
    }

    this.deps.logger.info({ locationId, ...settings }, 'Capacity settings updated');
    return this.getLocationCapacity(updated.id);
  }

  private async requireLocation(locationId: string, opts: OperationOptions): Promise<LocationRecord> {
    if (!isUuid(locationId)) {
      throw new InvalidIdError('location ID');
    }
    opts.signal?.throwIfAborted();

    const location = await this.deps.directory.getLocation(locationId);
    if (!location) {
      throw new NotFoundError('Location not found');
    }
    return location;
  }

  private async loadContext(locations: readonly LocationRecord[], date: string): Promise<OccupancyContext> {
    const { attendance, directory } = this.deps;
    const ids = locations.map((location) => location.id);
    const overflowIds = [
      ...new Set(locations.flatMap((location) => (location.overflowLocationId ? [location.overflowLocationId] : []))),
    ];

    const [open, staff, overflowLocations] = await Promise.all([
      attendance.listOpenAttendancesAt(ids, date),
      directory.listLocationStaff(ids),
      directory.getLocations(overflowIds),
    ]);

    return {
      open,
      rostered: new Set(staff.map((assignment) => rosterKey(assignment.locationId, assignment.personId))),
      overflowById: new Map(overflowLocations.map((location) => [location.id, location])),
    };
  }

  private summarize(location: LocationRecord, date: string, context: OccupancyContext): LocationCapacity {
    const present = context.open.filter((record) => record.locationId === location.id);
    const staffCount = present.filter((record) =>
      context.rostered.has(rosterKey(location.id, record.personId))
    ).length;
    const overflow = location.overflowLocationId
      ? context.overflowById.get(location.overflowLocationId)
      : undefined;

    return {
      ...computeCapacitySnapshot(location, present.length, this.deps.capacityWarningPercent),
      ...computeStaffRatio(location.staffToChildRatio, present.length, staffCount),
      location: toLocationSummary(location),
      isActive: location.isActive,
      occurrenceDate: date,
      overflowLocation: overflow ? toLocationSummary(overflow) : null,
      autoAssignOverflow: location.autoAssignOverflow,
    };
  }
}
