import { describe, it, expect } from 'vitest';
import {
  CapacityStatus,
  CheckinFailureReason,
  type CheckinResult,
  type CheckinSuccess,
} from '@roomsafe/shared';
import { ArgumentError, InvalidIdError, NotFoundError } from '../src/errors/domain.js';
import { createHarness } from './support/fixtures.js';

const UNKNOWN_LOCATION = '00000000-0000-4000-8000-000000000999';

function assertSuccess(result: CheckinResult): asserts result is CheckinSuccess {
  if (!result.success) {
    throw new Error(`Expected a successful check-in, got ${result.reason}`);
  }
}

describe('CapacityService.getLocationCapacity', () => {
  it('reports capacity status against soft and hard limits', async () => {
    const { store, services } = createHarness();
    const room = store.addLocation({ name: 'Preschool', softCapacity: 3, hardCapacity: 5 });
    const unlimited = store.addLocation({ name: 'Hall' });
    const kids = Array.from({ length: 5 }, (_v, i) =>
      store.addPerson({ firstName: `Kid${i}`, lastName: 'Count' })
    );

    for (const kid of kids.slice(0, 3)) {
      assertSuccess(await services.checkin.checkIn({ personId: kid.id, locationId: room.id }));
    }
    await expect(services.capacity.getLocationCapacity(room.id)).resolves.toEqual({
      currentCount: 3,
      softCapacity: 3,
      hardCapacity: 5,
      warningThreshold: 3,
      capacityStatus: CapacityStatus.NEAR_CAPACITY,
      percentageFull: 60,
      staffToChildRatio: null,
      currentStaffCount: 0,
      requiredStaffCount: null,
      meetsStaffRatio: true,
      location: { id: room.id, name: 'Preschool' },
      isActive: true,
      occurrenceDate: '2026-03-08',
      overflowLocation: null,
      autoAssignOverflow: false,
    });

    for (const kid of kids.slice(3)) {
      assertSuccess(await services.checkin.checkIn({ personId: kid.id, locationId: room.id }));
    }
    await expect(services.capacity.getLocationCapacity(room.id)).resolves.toMatchObject({
      currentCount: 5,
      capacityStatus: CapacityStatus.FULL,
      percentageFull: 100,
    });

    await expect(services.capacity.getLocationCapacity(unlimited.id, '2026-03-01')).resolves.toMatchObject({
      currentCount: 0,
      warningThreshold: null,
      capacityStatus: CapacityStatus.AVAILABLE,
      percentageFull: 0,
      occurrenceDate: '2026-03-01',
    });
  });

  it('rejects malformed and unknown locations', async () => {
    const { services } = createHarness();

    await expect(services.capacity.getLocationCapacity('room-1')).rejects.toBeInstanceOf(InvalidIdError);
    await expect(services.capacity.getLocationCapacity(UNKNOWN_LOCATION)).rejects.toBeInstanceOf(NotFoundError);
  });

  it('names the overflow location and whether attendees are routed to it', async () => {
    const { store, services } = createHarness();
    const overflow = store.addLocation({ name: 'Fellowship Hall' });
    const room = store.addLocation({
      name: 'Nursery',
      hardCapacity: 4,
      overflowLocationId: overflow.id,
      autoAssignOverflow: true,
    });

    await expect(services.capacity.getLocationCapacity(room.id)).resolves.toMatchObject({
      overflowLocation: { id: overflow.id, name: 'Fellowship Hall' },
      autoAssignOverflow: true,
    });
  });
});

describe('CapacityService staff ratio', () => {
  it('counts rostered staff apart from the children they supervise', async () => {
    const { store, services } = createHarness();
    const room = store.addLocation({ name: 'Toddlers', hardCapacity: 10, staffToChildRatio: 2 });
    const kids = Array.from({ length: 5 }, (_v, i) =>
      store.addPerson({ firstName: `Kid${i}`, lastName: 'Ratio' })
    );
    const lead = store.addPerson({ firstName: 'Lead', lastName: 'Ratio' });
    const helpers = [
      store.addPerson({ firstName: 'Helper1', lastName: 'Ratio' }),
      store.addPerson({ firstName: 'Helper2', lastName: 'Ratio' }),
    ];
    for (const leader of [lead, ...helpers]) store.addStaff(room, leader);

    for (const kid of kids) {
      assertSuccess(await services.checkin.checkIn({ personId: kid.id, locationId: room.id }));
    }
    assertSuccess(await services.checkin.checkIn({ personId: lead.id, locationId: room.id }));

    await expect(services.capacity.getLocationCapacity(room.id)).resolves.toMatchObject({
      currentCount: 6,
      staffToChildRatio: 2,
      currentStaffCount: 1,
      requiredStaffCount: 3,
      meetsStaffRatio: false,
    });
    await expect(services.capacity.validateStaffRatio(room.id)).resolves.toBe(false);

    for (const helper of helpers) {
      assertSuccess(await services.checkin.checkIn({ personId: helper.id, locationId: room.id }));
    }

    await expect(services.capacity.getLocationCapacity(room.id)).resolves.toMatchObject({
      currentCount: 8,
      currentStaffCount: 3,
      requiredStaffCount: 3,
      meetsStaffRatio: true,
    });
    await expect(services.capacity.validateStaffRatio(room.id)).resolves.toBe(true);
  });

  it('does not count staff rostered for another location', async () => {
    const { store, services } = createHarness();
    const room = store.addLocation({ name: 'Toddlers', staffToChildRatio: 4 });
    const other = store.addLocation({ name: 'Babies' });
    const kid = store.addPerson({ firstName: 'Kid', lastName: 'Ratio' });
    const leader = store.addPerson({ firstName: 'Leader', lastName: 'Ratio' });
    store.addStaff(other, leader);

    assertSuccess(await services.checkin.checkIn({ personId: kid.id, locationId: room.id }));
    assertSuccess(await services.checkin.checkIn({ personId: leader.id, locationId: room.id }));

    await expect(services.capacity.getLocationCapacity(room.id)).resolves.toMatchObject({
      currentCount: 2,
      currentStaffCount: 0,
      requiredStaffCount: 1,
      meetsStaffRatio: false,
    });
  });

  it('passes locations without a ratio', async () => {
    const { store, services } = createHarness();
    const room = store.addLocation({ name: 'Hall' });
    const kid = store.addPerson({ firstName: 'Kid', lastName: 'Ratio' });
    assertSuccess(await services.checkin.checkIn({ personId: kid.id, locationId: room.id }));

    await expect(services.capacity.validateStaffRatio(room.id)).resolves.toBe(true);
  });
});

describe('CapacityService.getMultipleLocationCapacities', () => {
  it('returns capacities in request order and skips ids it cannot resolve', async () => {
    const { store, services } = createHarness();
    const first = store.addLocation({ name: 'First', hardCapacity: 10 });
    const second = store.addLocation({ name: 'Second', hardCapacity: 10 });
    const kid = store.addPerson({ firstName: 'Kid', lastName: 'Batch' });
    assertSuccess(await services.checkin.checkIn({ personId: kid.id, locationId: first.id }));

    const capacities = await services.capacity.getMultipleLocationCapacities([
      second.id.toUpperCase(),
      'not-a-location',
      UNKNOWN_LOCATION,
      first.id,
      second.id,
    ]);

    expect(capacities.map((c) => [c.location.name, c.currentCount])).toEqual([
      ['Second', 0],
      ['First', 1],
    ]);
  });

  it('returns nothing when no id is well formed', async () => {
    const { services } = createHarness();

    await expect(services.capacity.getMultipleLocationCapacities(['a', 'b'])).resolves.toEqual([]);
  });
});

describe('CapacityService.getOverflowLocationCapacity', () => {
  it('reports the overflow location, or null when none is set', async () => {
    const { store, services } = createHarness();
    const overflow = store.addLocation({ name: 'Fellowship Hall', hardCapacity: 20 });
    const room = store.addLocation({ name: 'Nursery', hardCapacity: 4, overflowLocationId: overflow.id });
    const standalone = store.addLocation({ name: 'Library' });

    await expect(services.capacity.getOverflowLocationCapacity(room.id)).resolves.toMatchObject({
      location: { id: overflow.id, name: 'Fellowship Hall' },
      hardCapacity: 20,
      currentCount: 0,
    });
    await expect(services.capacity.getOverflowLocationCapacity(standalone.id)).resolves.toBeNull();
    await expect(services.capacity.getOverflowLocationCapacity('nursery')).rejects.toBeInstanceOf(
      InvalidIdError
    );
  });
});

describe('overflow suggestions on a full location', () => {
  it('points a refused check-in at the overflow location while it has room', async () => {
    const { store, services } = createHarness();
    const overflow = store.addLocation({ name: 'Fellowship Hall', hardCapacity: 2 });
    const room = store.addLocation({
      name: 'Nursery',
      hardCapacity: 1,
      overflowLocationId: overflow.id,
      autoAssignOverflow: true,
    });
    const ada = store.addPerson({ firstName: 'Ada', lastName: 'Overflow' });
    const bo = store.addPerson({ firstName: 'Bo', lastName: 'Overflow' });
    const cy = store.addPerson({ firstName: 'Cy', lastName: 'Overflow' });
    const di = store.addPerson({ firstName: 'Di', lastName: 'Overflow' });
    assertSuccess(await services.checkin.checkIn({ personId: ada.id, locationId: room.id }));

    await expect(services.checkin.checkIn({ personId: bo.id, locationId: room.id })).resolves.toEqual({
      success: false,
      reason: CheckinFailureReason.AT_CAPACITY,
      message: 'Location is at capacity',
      retryable: false,
      overflow: {
        location: { id: overflow.id, name: 'Fellowship Hall' },
        capacityStatus: CapacityStatus.AVAILABLE,
        canAccept: true,
      },
    });

    assertSuccess(await services.checkin.checkIn({ personId: bo.id, locationId: overflow.id }));
    assertSuccess(await services.checkin.checkIn({ personId: cy.id, locationId: overflow.id }));

    await expect(services.checkin.checkIn({ personId: di.id, locationId: room.id })).resolves.toMatchObject({
      reason: CheckinFailureReason.AT_CAPACITY,
      overflow: { capacityStatus: CapacityStatus.FULL, canAccept: false },
    });
  });

  it('includes the suggestion in a pre-flight validation', async () => {
    const { store, services } = createHarness();
    const overflow = store.addLocation({ name: 'Fellowship Hall' });
    const room = store.addLocation({
      name: 'Nursery',
      hardCapacity: 1,
      overflowLocationId: overflow.id,
      autoAssignOverflow: true,
    });
    const a = store.addPerson({ firstName: 'Ada', lastName: 'Overflow' });
    const b = store.addPerson({ firstName: 'Bo', lastName: 'Overflow' });
    assertSuccess(await services.checkin.checkIn({ personId: a.id, locationId: room.id }));

    await expect(services.checkin.validateCheckIn({ personId: b.id, locationId: room.id })).resolves.toEqual({
      isAllowed: false,
      reason: CheckinFailureReason.AT_CAPACITY,
      message: 'Location is at capacity',
      overflow: {
        location: { id: overflow.id, name: 'Fellowship Hall' },
        capacityStatus: CapacityStatus.AVAILABLE,
        canAccept: true,
      },
    });
  });

  it('leaves the suggestion out unless the location auto-assigns', async () => {
    const { store, services } = createHarness();
    const overflow = store.addLocation({ name: 'Fellowship Hall' });
    const room = store.addLocation({ name: 'Nursery', hardCapacity: 1, overflowLocationId: overflow.id });
    const a = store.addPerson({ firstName: 'Ada', lastName: 'Overflow' });
    const b = store.addPerson({ firstName: 'Bo', lastName: 'Overflow' });
    assertSuccess(await services.checkin.checkIn({ personId: a.id, locationId: room.id }));

    const refused = await services.checkin.checkIn({ personId: b.id, locationId: room.id });

    expect(refused).toMatchObject({ success: false, reason: CheckinFailureReason.AT_CAPACITY });
    expect(refused).not.toHaveProperty('overflow');
  });
});

describe('CapacityService.updateCapacitySettings', () => {
  it('replaces the settings and returns the new capacity', async () => {
    const { store, services } = createHarness();
    const room = store.addLocation({ name: 'Nursery', softCapacity: 2, hardCapacity: 3 });
    const spare = store.addLocation({ name: 'Spare Room' });

    await expect(
      services.capacity.updateCapacitySettings(room.id, {
        softCapacity: 4,
        hardCapacity: 6,
        staffToChildRatio: 3,
        overflowLocationId: spare.id,
        autoAssignOverflow: true,
      })
    ).resolves.toMatchObject({
      location: { id: room.id, name: 'Nursery' },
      softCapacity: 4,
      hardCapacity: 6,
      warningThreshold: 4,
      staffToChildRatio: 3,
      overflowLocation: { id: spare.id, name: 'Spare Room' },
      autoAssignOverflow: true,
    });

    await services.capacity.updateCapacitySettings(room.id, {
      softCapacity: null,
      hardCapacity: null,
      staffToChildRatio: null,
      overflowLocationId: null,
      autoAssignOverflow: false,
    });
    await expect(services.capacity.getLocationCapacity(room.id)).resolves.toMatchObject({
      softCapacity: null,
      hardCapacity: null,
      staffToChildRatio: null,
      overflowLocation: null,
      autoAssignOverflow: false,
    });
  });

  it('rejects inconsistent settings', async () => {
    const { store, services } = createHarness();
    const room = store.addLocation({ name: 'Nursery' });
    const base = {
      softCapacity: null,
      hardCapacity: null,
      staffToChildRatio: null,
      overflowLocationId: null,
      autoAssignOverflow: false,
    };

    await expect(
      services.capacity.updateCapacitySettings(room.id, { ...base, softCapacity: 5, hardCapacity: 4 })
    ).rejects.toThrow('Soft capacity must be less than or equal to hard capacity');
    await expect(
      services.capacity.updateCapacitySettings(room.id, { ...base, staffToChildRatio: 0 })
    ).rejects.toBeInstanceOf(ArgumentError);
    await expect(
      services.capacity.updateCapacitySettings(room.id, { ...base, overflowLocationId: room.id })
    ).rejects.toThrow('A location cannot overflow into itself');
    await expect(
      services.capacity.updateCapacitySettings(room.id, { ...base, overflowLocationId: UNKNOWN_LOCATION })
    ).rejects.toThrow('Overflow location not found');
    await expect(
      services.capacity.updateCapacitySettings(room.id, { ...base, overflowLocationId: 'spare' })
    ).rejects.toBeInstanceOf(InvalidIdError);
    await expect(services.capacity.updateCapacitySettings(UNKNOWN_LOCATION, base)).rejects.toBeInstanceOf(
      NotFoundError
    );
  });
});
