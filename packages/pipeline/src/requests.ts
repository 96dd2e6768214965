import { z } from 'zod';
import { isKnownParameter, isResolution, RESOLUTIONS } from './catalogue';
import { ArgumentValidationError } from './errors';
import { padStationId } from './values';

const observationStationId = z
  .union([z.string(), z.number().int().nonnegative()])
  .transform((value) => String(value).trim())
  .refine((value) => /^\d{1,5}$/.test(value), { message: 'Station ids are 1 to 5 digits' })
  .transform(padStationId);

const forecastStationId = z
  .string()
  .trim()
  .regex(/^[A-Za-z0-9]{1,5}$/, 'Forecast station ids are 1 to 5 letters or digits')
  .transform(padStationId);

const timestamp = z.union([z.string(), z.date()]).pipe(z.coerce.date());

const observationRequestSchema = z
  .object({
    resolution: z.string().trim(),
    parameter: z.string().trim().min(1),
    stationIds: z.array(observationStationId).min(1).optional(),
    dateStart: timestamp.optional(),
    dateEnd: timestamp.optional(),
    failFast: z.boolean().default(false)
  })
  .superRefine((request, ctx) => {
    if (!isResolution(request.resolution)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['resolution'],
        message: `Unknown resolution "${request.resolution}", expected one of ${RESOLUTIONS.join(', ')}`
      });
    } else if (!isKnownParameter(request.resolution, request.parameter)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['parameter'],
        message: `Unknown parameter "${request.parameter}" for resolution ${request.resolution}`
      });
    }
    if (request.dateStart && request.dateEnd && request.dateStart.getTime() >= request.dateEnd.getTime()) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['dateEnd'], message: 'dateEnd must be after dateStart' });
    }
  })
  .transform((request, ctx) => {
    const { resolution } = request;
    if (!isResolution(resolution)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['resolution'], message: 'Unknown resolution' });
      return z.NEVER;
    }
    return { ...request, resolution };
  });

export type ObservationRequest = z.output<typeof observationRequestSchema>;
export type ObservationRequestInput = z.input<typeof observationRequestSchema>;

const forecastRequestSchema = z.object({
  stationIds: z.array(forecastStationId).min(1).optional(),
  parameters: z
    .array(z.string().trim().regex(/^[A-Za-z0-9_]+$/, 'Forecast element names are letters, digits or underscores'))
    .min(1)
    .optional(),
  includeStations: z.boolean().default(true),
  allStations: z.boolean().default(false)
});

export type ForecastRequest = z.output<typeof forecastRequestSchema>;
export type ForecastRequestInput = z.input<typeof forecastRequestSchema>;

function parseWith<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw ArgumentValidationError.fromZod(result.error);
  }
  return result.data;
}

/** Validates and canonicalises an observation request before anything is fetched. */
export function parseObservationRequest(input: unknown): ObservationRequest {
  return parseWith(observationRequestSchema, input);
}

export function parseForecastRequest(input: unknown): ForecastRequest {
  return parseWith(forecastRequestSchema, input);
}

/** Throws when a requested station is missing from the authoritative station list. */
export function assertStationsKnown(requested: Iterable<string>, known: Iterable<{ stationId: string }>): void {
  const knownIds = new Set<string>();
  for (const station of known) {
    knownIds.add(station.stationId);
  }
  const unknown = [...requested].filter((stationId) => !knownIds.has(stationId));
  if (unknown.length > 0) {
    throw new ArgumentValidationError(unknown.map((stationId) => `Unknown station ${stationId}`));
  }
}
