import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest'
import { OrthostaticTracker } from '@/services/orthostatic/orthostatic-tracker'
import type { OrthostaticEventUpdate } from '@/services/orthostatic/orthostatic-types'
import { getSeverity } from '@/services/orthostatic/severity'
import { DEFAULT_SETTINGS } from '@/types/settings'

const T0 = 1_700_000_000_000

function at(seconds: number): number {
  return T0 + seconds * 1000
}

function sequentialIds(): () => string {
  let next = 0
  return () => {
    next += 1
    return `event-${next}`
  }
}

describe('OrthostaticTracker', () => {
  let tracker: OrthostaticTracker
  let onEvent: Mock<[OrthostaticEventUpdate], void>

  beforeEach(() => {
    onEvent = vi.fn<[OrthostaticEventUpdate], void>()
    tracker = new OrthostaticTracker(DEFAULT_SETTINGS.orthostatic, {
      onEvent,
      createId: sequentialIds(),
    })
  })

  describe('episode lifecycle', () => {
    it('should be idle before standing', () => {
      expect(tracker.getPhase()).toBe('idle')
      expect(tracker.getEpisode()).toBeNull()
      expect(tracker.onHeartRate(120, at(20))).toBeNull()
    })

    it('should open an episode with the given baseline', () => {
      tracker.startStanding(at(0), 70)

      expect(tracker.getPhase()).toBe('no-elevation')
      expect(tracker.getEpisode()).toMatchObject({
        startedAt: at(0),
        baselineRate: 70,
        pattern: [],
        isElevated: false,
        pendingEventId: null,
      })
    })

    it('should ignore samples during the warmup', () => {
      tracker.startStanding(at(0), 70)

      expect(tracker.onHeartRate(110, at(9))).toBeNull()
      expect(tracker.getEpisode()?.pattern).toEqual([])
      expect(tracker.getPhase()).toBe('no-elevation')
    })

    it('should record the pattern from the warmup on', () => {
      tracker.startStanding(at(0), 70)
      tracker.onHeartRate(80, at(10))
      tracker.onHeartRate(82, at(15))

      expect(tracker.getEpisode()?.pattern).toEqual([
        { rate: 80, secondsSinceStanding: 10 },
        { rate: 82, secondsSinceStanding: 15 },
      ])
    })

    it('should reset elevation state on a new episode', () => {
      tracker.startStanding(at(0), 70)
      tracker.onHeartRate(105, at(20))

      tracker.startStanding(at(200), 80)

      expect(tracker.getPhase()).toBe('no-elevation')
      expect(tracker.getEpisode()?.baselineRate).toBe(80)
      expect(tracker.getEpisode()?.pattern).toEqual([])
    })

    it('should disable events when the baseline is unknown', () => {
      tracker.startStanding(at(0), 0)

      expect(tracker.onHeartRate(120, at(20))).toBeNull()
      expect(tracker.onHeartRate(70, at(80))).toBeNull()
      expect(tracker.getPhase()).toBe('no-elevation')
      expect(tracker.getEvents()).toEqual([])
    })
  })

  describe('elevation', () => {
    it('should enter the elevated phase at +30 over baseline', () => {
      tracker.startStanding(at(0), 70)

      expect(tracker.onHeartRate(99, at(15))).toBeNull()
      expect(tracker.getPhase()).toBe('no-elevation')

      expect(tracker.onHeartRate(100, at(20))).toBeNull()
      expect(tracker.getPhase()).toBe('elevated')
      expect(tracker.getEpisode()?.elevationStartedAt).toBe(at(20))
    })

    it('should discard an elevation shorter than 30s', () => {
      tracker.startStanding(at(0), 70)
      tracker.onHeartRate(105, at(20))

      expect(tracker.onHeartRate(95, at(49))).toBeNull()
      expect(tracker.getPhase()).toBe('recovering')
      expect(tracker.getEvents()).toEqual([])
      expect(onEvent).not.toHaveBeenCalled()
    })

    it('should create an event for an elevation of exactly 30s', () => {
      tracker.startStanding(at(0), 70)
      tracker.onHeartRate(105, at(20))

      const update = tracker.onHeartRate(95, at(50))

      expect(update).toEqual({
        kind: 'created',
        event: {
          id: 'event-1',
          timestamp: at(20),
          baselineRate: 70,
          peakRate: 105,
          increase: 35,
          standingSeconds: 50,
          sustainedSeconds: 30,
          recoverySeconds: null,
          pattern: [
            { rate: 105, secondsSinceStanding: 20 },
            { rate: 95, secondsSinceStanding: 50 },
          ],
          isRecovered: false,
        },
      })
      expect(onEvent).toHaveBeenCalledWith(update)
      expect(tracker.getEpisode()?.pendingEventId).toBe('event-1')
    })

    it('should take the peak from the whole pattern window', () => {
      tracker.startStanding(at(0), 70)
      tracker.onHeartRate(105, at(20))
      tracker.onHeartRate(112, at(30))
      tracker.onHeartRate(104, at(40))

      const update = tracker.onHeartRate(90, at(60))

      expect(update?.event.peakRate).toBe(112)
      expect(update?.event.increase).toBe(42)
    })

    it('should drop pattern points older than the window', () => {
      tracker.startStanding(at(0), 70)
      tracker.onHeartRate(80, at(10))
      tracker.onHeartRate(82, at(300))
      tracker.onHeartRate(84, at(610))

      expect(tracker.getEpisode()?.pattern).toEqual([
        { rate: 82, secondsSinceStanding: 300 },
        { rate: 84, secondsSinceStanding: 610 },
      ])
    })

    it('should finalize an ongoing elevation when standing ends', () => {
      tracker.startStanding(at(0), 70)
      tracker.onHeartRate(105, at(20))
      tracker.onHeartRate(108, at(80))

      const update = tracker.endStanding(at(100))

      expect(update?.kind).toBe('created')
      expect(update?.event).toMatchObject({
        timestamp: at(20),
        peakRate: 108,
        increase: 38,
        standingSeconds: 100,
        sustainedSeconds: 80,
        isRecovered: false,
      })
      expect(tracker.getPhase()).toBe('idle')
    })

    it('should not finalize a brief elevation when standing ends', () => {
      tracker.startStanding(at(0), 70)
      tracker.onHeartRate(105, at(20))

      expect(tracker.endStanding(at(40))).toBeNull()
      expect(tracker.getEvents()).toEqual([])
    })

    it('should return null when ending without an episode', () => {
      expect(tracker.endStanding(at(0))).toBeNull()
    })
  })

  describe('recovery', () => {
    function createEventAt50(): void {
      tracker.startStanding(at(0), 70)
      tracker.onHeartRate(105, at(20))
      tracker.onHeartRate(95, at(50))
    }

    it('should amend the event once the rate holds within 10 BPM for 30s', () => {
      createEventAt50()
      const created = tracker.getEvents()[0]

      expect(tracker.onHeartRate(78, at(60))).toBeNull()
      expect(tracker.onHeartRate(76, at(85))).toBeNull()
      const update = tracker.onHeartRate(75, at(90))

      expect(update).toEqual({
        kind: 'amended',
        event: { ...created, recoverySeconds: 30, isRecovered: true },
        previous: created,
      })
      expect(tracker.getEvents()).toEqual([{ ...created, recoverySeconds: 30, isRecovered: true }])
      expect(tracker.getPhase()).toBe('recovered')
      expect(onEvent).toHaveBeenCalledTimes(2)
    })

    it('should restart the recovery clock when the rate leaves the band', () => {
      createEventAt50()

      tracker.onHeartRate(78, at(60))
      tracker.onHeartRate(85, at(70))
      tracker.onHeartRate(78, at(80))
      expect(tracker.onHeartRate(77, at(100))).toBeNull()

      const update = tracker.onHeartRate(77, at(110))

      expect(update?.kind).toBe('amended')
      expect(update?.event.recoverySeconds).toBe(30)
    })

    it('should amend at most once', () => {
      createEventAt50()
      tracker.onHeartRate(78, at(60))
      tracker.onHeartRate(75, at(90))

      expect(tracker.onHeartRate(74, at(200))).toBeNull()
      expect(tracker.getEvents()[0].recoverySeconds).toBe(30)
      expect(onEvent).toHaveBeenCalledTimes(2)
    })

    it('should start a new elevation after recovering', () => {
      createEventAt50()
      tracker.onHeartRate(106, at(100))

      expect(tracker.getPhase()).toBe('elevated')
      expect(tracker.getEpisode()?.pendingEventId).toBe('event-1')
    })

    it('should amend the last event after a brief re-elevation', () => {
      tracker.startStanding(at(0), 70)
      tracker.onHeartRate(105, at(20))
      tracker.onHeartRate(105, at(80))
      tracker.onHeartRate(90, at(90))
      tracker.onHeartRate(105, at(100))
      tracker.onHeartRate(75, at(110))

      const update = tracker.onHeartRate(75, at(150))

      expect(update?.kind).toBe('amended')
      expect(update?.event.id).toBe('event-1')
      expect(update?.event.recoverySeconds).toBe(40)
      expect(tracker.getEvents()).toHaveLength(1)
      expect(tracker.getEvents()[0].isRecovered).toBe(true)
      expect(tracker.getPhase()).toBe('recovered')
    })

    it('should not amend again after a later brief re-elevation', () => {
      createEventAt50()
      tracker.onHeartRate(78, at(60))
      tracker.onHeartRate(75, at(90))
      tracker.onHeartRate(105, at(100))
      tracker.onHeartRate(75, at(110))

      expect(tracker.onHeartRate(75, at(140))).toBeNull()
      expect(tracker.getEvents()[0].recoverySeconds).toBe(30)
      expect(onEvent).toHaveBeenCalledTimes(2)
    })

    it('should not amend an event from an earlier episode', () => {
      createEventAt50()
      tracker.endStanding(at(60))

      tracker.startStanding(at(100), 70)
      tracker.onHeartRate(105, at(120))
      tracker.onHeartRate(75, at(130))

      expect(tracker.onHeartRate(75, at(160))).toBeNull()
      expect(tracker.getPhase()).toBe('recovered')
      expect(tracker.getEvents()[0].isRecovered).toBe(false)
    })
  })

  describe('event log', () => {
    it('should keep at most 20 events, evicting the oldest', () => {
      for (let i = 0; i < 21; i++) {
        const base = i * 100
        tracker.startStanding(at(base), 70)
        tracker.onHeartRate(105, at(base + 10))
        tracker.onHeartRate(80, at(base + 40))
      }

      const events = tracker.getEvents()
      expect(events).toHaveLength(20)
      expect(events[0].id).toBe('event-2')
      expect(events[19].id).toBe('event-21')
    })

    it('should restore and clear events', () => {
      tracker.startStanding(at(0), 70)
      tracker.onHeartRate(105, at(20))
      tracker.onHeartRate(95, at(50))
      const saved = tracker.getEvents()

      const restored = new OrthostaticTracker()
      restored.restoreEvents(saved)
      expect(restored.getEvents()).toEqual(saved)

      restored.clearEvents()
      expect(restored.getEvents()).toEqual([])
    })
  })

  describe('sustained standing scenario', () => {
    it('should report a severe event and its recovery', () => {
      tracker.startStanding(at(0), 70)

      expect(tracker.onHeartRate(95, at(12))).toBeNull()
      expect(tracker.onHeartRate(105, at(35))).toBeNull()
      expect(tracker.onHeartRate(108, at(600))).toBeNull()
      expect(tracker.onHeartRate(102, at(960))).toBeNull()

      const created = tracker.onHeartRate(98, at(965))
      expect(created?.kind).toBe('created')
      expect(created?.event).toMatchObject({
        timestamp: at(35),
        baselineRate: 70,
        peakRate: 108,
        increase: 38,
        standingSeconds: 965,
        sustainedSeconds: 930,
        recoverySeconds: null,
        isRecovered: false,
      })
      expect(created?.event.pattern).toEqual([
        { rate: 108, secondsSinceStanding: 600 },
        { rate: 102, secondsSinceStanding: 960 },
        { rate: 98, secondsSinceStanding: 965 },
      ])
      const createdEvent = tracker.getEvents()[0]
      expect(getSeverity(createdEvent)).toBe('severe')

      expect(tracker.onHeartRate(78, at(1010))).toBeNull()
      const amended = tracker.onHeartRate(76, at(1045))

      expect(amended?.kind).toBe('amended')
      expect(amended?.event.recoverySeconds).toBe(35)
      expect(amended?.event.isRecovered).toBe(true)
    })
  })
})
