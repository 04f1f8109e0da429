import z from 'zod';

import { Clock } from '../utils/clock';

const integerSchema = z
    .string()
    .regex(/^-?\d+$/, 'expected an integer')
    .transform(val => Number.parseInt(val));

const positiveNumberSchema = z
    .string()
    .transform(val => Number.parseFloat(val))
    .pipe(z.number().finite().nonnegative());

const optionalIntegerSchema = z
    .string()
    .transform(val => (val === '' ? null : val))
    .pipe(integerSchema.nullable());

/** `HH:MM AM/PM`; an empty cell or EOD means no constraint */
const optionalTimeSchema = z.string().transform((val, ctx) => {
    if (val === '' || val.toUpperCase() === 'EOD') {
        return null;
    }
    if (!Clock.isValid(val)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid time "${val}"` });
        return z.NEVER;
    }
    return Clock.parse(val);
});

export const locationRowSchema = z.object({
    id: integerSchema,
    name: z.string(),
    address: z.string().min(1),
    city: z.string().min(1),
    state: z.string().min(1),
    zip: z.string().min(1),
});

export const distanceRowSchema = z.object({
    from_id: integerSchema,
    to_id: integerSchema,
    miles: positiveNumberSchema,
});

export const truckRowSchema = z.object({
    id: integerSchema,
    capacity: integerSchema.pipe(z.number().positive()),
    avg_speed_mph: positiveNumberSchema.pipe(z.number().positive()),
    delivery_time_min: positiveNumberSchema,
});

export const packageRowSchema = z.object({
    id: integerSchema,
    address: z.string().min(1),
    city: z.string().min(1),
    state: z.string().min(1),
    zip: z.string().min(1),
    arrival_time: optionalTimeSchema,
    deadline: optionalTimeSchema,
    mass_kg: positiveNumberSchema,
    truck_id: optionalIntegerSchema,
    group_id: optionalIntegerSchema,
    note: z.string().default(''),
});
