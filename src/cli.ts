#!/usr/bin/env node
import { Command } from 'commander';
import { getConfig, loadConfig } from './config';
import { RankedResultBuilder } from './modules/ranker';
import { createOracle } from './modules/oracle';
import { AnalysisPipeline } from './pipeline';
import { startServer } from './server';
import { toError } from './utils/errors';

const program = new Command();

program
    .name('product-titles')
    .description('Ranks product names found on a web page with a named-entity classifier')
    .version('1.0.0')
    .option('-c, --config <path>', 'Path to custom config YAML');

program
    .command('serve')
    .description('Start the HTTP API and static front-end')
    .option('-p, --port <port>', 'Port to listen on', value => parseInt(value, 10))
    .action(async (options: { port?: number }) => {
        try {
            await startServer({ port: options.port, configPath: program.opts<{ config?: string }>().config });
        } catch (e) {
            console.error('Fatal Error:', toError(e).message);
            process.exit(1);
        }
    });

program
    .command('analyze')
    .description('Analyze a single URL and print the ranked product names')
    .argument('<url>', 'Page URL (http:// or https://)')
    .option('--json', 'Print the raw response envelope')
    .action(async (url: string, options: { json?: boolean }) => {
        try {
            loadConfig(program.opts<{ config?: string }>().config);
            const oracle = createOracle(getConfig());
            await oracle.load();

            const pipeline = new AnalysisPipeline({ oracle });
            const response = RankedResultBuilder.toResponse(await pipeline.analyze(url));

            if (options.json) {
                console.log(JSON.stringify(response, null, 2));
            } else {
                if (response.message) console.log(response.message);
                if (response.results.length > 0) console.table(response.results);
                console.log(`${response.products_identified} products among ${response.total_titles_found} titles`);
            }
            process.exitCode = response.error ? 2 : 0;
        } catch (e) {
            console.error('Fatal Error:', toError(e).message);
            process.exit(1);
        }
    });

program.parseAsync(process.argv).catch(e => {
    console.error('Fatal Error:', toError(e).message);
    process.exit(1);
});
