import z from 'zod';

const configSchema = z.object({
    DELIVERY_SIM_DEBUG: z
        .enum(['true', 'false'])
        .default('false')
        .transform(val => val === 'true'),
    DELIVERY_SIM_DATA_DIR: z.string().min(1).default('data'),
    DELIVERY_SIM_START_TIME: z.string().default('08:00 AM'),
});

export type SimulationConfig = z.infer<typeof configSchema>;

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): SimulationConfig => {
    const result = configSchema.safeParse(env);

    if (!result.success) {
        throw new Error(`Invalid environment configuration: ${result.error.message}`);
    }

    return result.data;
};

if (import.meta.vitest) {
    const { test, expect } = import.meta.vitest;

    test('should apply defaults', () => {
        expect(loadConfig({})).toEqual({
            DELIVERY_SIM_DEBUG: false,
            DELIVERY_SIM_DATA_DIR: 'data',
            DELIVERY_SIM_START_TIME: '08:00 AM',
        });
    });

    test('should parse the debug flag', () => {
        expect(loadConfig({ DELIVERY_SIM_DEBUG: 'true' }).DELIVERY_SIM_DEBUG).toBe(true);
        expect(() => loadConfig({ DELIVERY_SIM_DEBUG: 'yes' })).toThrowError('Invalid environment configuration');
    });
}
