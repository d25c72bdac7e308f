import { z } from 'zod'
import {
  ACTIVITY_CONFIDENCES,
  ACTIVITY_KINDS,
} from '@/services/posture-detection/posture-types'

const TimestampZ = z.number().finite().nonnegative()

export const PostureSampleZ = z.object({
  activity: z.enum(ACTIVITY_KINDS),
  confidence: z.enum(ACTIVITY_CONFIDENCES),
  timestamp: TimestampZ,
})

export const AccelerationSampleZ = z.object({
  x: z.number().finite(),
  y: z.number().finite(),
  z: z.number().finite(),
  timestamp: TimestampZ,
})

export const HeartRateSampleZ = z.object({
  bpm: z.number().int().positive(),
  timestamp: TimestampZ,
})

