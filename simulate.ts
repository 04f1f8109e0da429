/**
 * @file simulate.ts
 * @description
 * Runs one delivery day on a hub data set and prints the results.
 *
 * Usage:
 *   tsx simulate.ts [data-dir] [--at "HH:MM AM/PM"] [--routes]
 *
 * Without --at the end-of-day hub summary is printed. With --at every package and truck report is
 * printed as of that minute, which must fall within the hours of operation.
 */

import path from 'path';

import { loadConfig } from './src/config';
import {
    formatAllPackages,
    formatAllTrucks,
    formatHubSummary,
    parseReportTime,
} from './src/report/hub-report';
import { DeliverySimulation } from './src/simulation/driver';
import { Clock } from './src/utils/clock';
import { loadHubData } from './src/utils/hub-loader';
import { createConsoleLogger } from './src/utils/logger';

interface RunnerArgs {
    dataDir?: string;
    at?: string;
    includeRoutes: boolean;
}

const parseArgs = (argv: ReadonlyArray<string>): RunnerArgs => {
    const args: RunnerArgs = { includeRoutes: false };

    for (let i = 0; i < argv.length; ++i) {
        const arg = argv[i];

        if (arg === '--at') {
            args.at = argv[++i];
        } else if (arg === '--routes') {
            args.includeRoutes = true;
        } else {
            args.dataDir = arg;
        }
    }

    return args;
};

const main = async () => {
    const config = loadConfig();
    const logger = createConsoleLogger(config.DELIVERY_SIM_DEBUG);
    const args = parseArgs(process.argv.slice(2));

    const dataDir = path.resolve(args.dataDir ?? config.DELIVERY_SIM_DATA_DIR);
    const hubData = await loadHubData(dataDir);

    logger.info(
        `Loaded ${hubData.packages.length} packages, ${hubData.trucks.length} trucks and ${hubData.locations.vertices().length} locations from ${dataDir}`,
    );

    const simulation = new DeliverySimulation({
        ...hubData,
        startTime: Clock.parse(config.DELIVERY_SIM_START_TIME),
        logger,
    });

    const start = process.hrtime.bigint();
    const result = simulation.run();
    const execTime = Number((process.hrtime.bigint() - start) / BigInt(1e6));

    logger.info(`Simulated ${result.ticks} minutes in ${execTime}ms.`);
    logger.info('');

    if (args.at === undefined) {
        logger.info(formatHubSummary(simulation.ctx, result.startTime, result.endTime));
        return;
    }

    const time = parseReportTime(args.at, result.startTime, result.endTime);

    logger.info(formatHubSummary(simulation.ctx, result.startTime, time));
    logger.info(formatAllPackages(simulation.ctx, time));
    logger.info(formatAllTrucks(simulation.ctx, time, args.includeRoutes));
};

main().catch(err => {
    console.error(err);
    process.exit(1);
});
