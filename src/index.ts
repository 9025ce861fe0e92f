#!/usr/bin/env node
import 'dotenv/config';
import * as readline from 'readline';
import { CLI, parseArgs } from './cli/commands';
import { describeError } from './core/errors';
import { Logger } from './core/logger';
import { ChatNode, startChat } from './core/node';
import { InboundMessage } from './core/types';
import { WebDashboard } from './web/server';

async function bootstrap() {
    const args = parseArgs(process.argv.slice(2));
    const logger = new Logger();

    const node = await startChat({
        displayName: args.name,
        listenPort: args.port,
        listenHost: args.host,
        // a specific bind address is also the one peers should dial
        address: args.host && !WILDCARD_HOSTS.has(args.host) ? args.host : undefined,
        logger,
    });
    const cli = new CLI(node);
    cli.banner();

    for (const target of args.connect) {
        cli.connectEndpoint(target).catch(fatal);
    }

    let dashboard: WebDashboard | undefined;
    if (args.web) {
        dashboard = new WebDashboard(node);
        await dashboard.start();
    }

    const rl = readline.createInterface({
        input: process.stdin,
        output: process.stdout,
        prompt: `${args.name}> `,
    });

    node.on('message', (message: InboundMessage) => {
        readline.clearLine(process.stdout, 0);
        readline.cursorTo(process.stdout, 0);
        cli.showInbound(message);
        rl.prompt(true);
    });

    let stopping = false;
    const stop = async () => {
        if (stopping) return;
        stopping = true;
        rl.close();
        await dashboard?.stop();
        await shutdown(node);
        process.exit(0);
    };

    rl.on('SIGINT', () => {
        stop().catch(fatal);
    });
    rl.prompt();

    for await (const line of rl) {
        if ((await cli.handleLine(line)) === 'quit') break;
        rl.prompt();
    }
    await stop();
}

const WILDCARD_HOSTS = new Set(['0.0.0.0', '::']);

const shutdown = async (node: ChatNode) => {
    try {
        await node.shutdown();
    } catch (err) {
        console.error(`\x1b[31m[ERROR]\x1b[0m Shutdown failed: ${describeError(err)}`);
    }
};

const fatal = (err: unknown) => {
    console.error(`\x1b[31m[FATAL]\x1b[0m ${describeError(err)}`);
    process.exit(1);
};

bootstrap().catch(fatal);
