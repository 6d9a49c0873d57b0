#!/usr/bin/env node
import { Command } from 'commander';
import path from 'path';

import { createDiscoveryContext, DiscoveryContext } from './context';
import { isConfirmedStatus } from './core/lifecycle/profile_state_machine';
import { loadSeedFile } from './repository/seed_loader';
import { DiscoveryResult } from './types';
import { DirectoryDiscoveryError, toError } from './utils/errors';

const program = new Command();

function list(value: string): string[] {
    return value
        .split(',')
        .map((part) => part.trim())
        .filter(Boolean);
}

function print(value: unknown): void {
    console.log(JSON.stringify(value, null, 2));
}

function summarize(result: DiscoveryResult): string {
    const top = result.candidates[0];
    const best = top ? ` best=${top.score} ${top.profile_url}` : '';
    return `${result.site_id}: ${result.outcome_kind} (attempts=${result.attempts}, candidates=${result.candidates.length})${best}`;
}

async function run(task: (ctx: DiscoveryContext) => Promise<void>): Promise<void> {
    let ctx: DiscoveryContext | null = null;
    try {
        ctx = await createDiscoveryContext();
        await task(ctx);
    } catch (e) {
        const error = toError(e);
        const code = error instanceof DirectoryDiscoveryError ? ` [${error.code}]` : '';
        console.error(`Error${code}: ${error.message}`);
        process.exitCode = 1;
    } finally {
        await ctx?.repository.close();
    }
}

program
    .name('profile-discovery')
    .description('Find, match and track therapist profiles across directory sites')
    .version('1.0.0');

program
    .command('load')
    .description('Load therapists and directories from a YAML seed file')
    .argument('<file>', 'Seed YAML path')
    .action(async (file: string) => {
        await run(async (ctx) => {
            print(await loadSeedFile(path.resolve(file), ctx.repository));
        });
    });

program
    .command('directories')
    .description('List configured directories')
    .action(async () => {
        await run(async (ctx) => {
            const directories = await ctx.repository.listDirectories();
            for (const d of directories) {
                console.log(`${d.directory_id}\t${d.adapter_key}\t${d.base_url}`);
            }
        });
    });

program
    .command('search')
    .description('Search one directory for one therapist')
    .argument('<therapistId>')
    .argument('<directoryId>')
    .action(async (therapistId: string, directoryId: string) => {
        await run(async (ctx) => {
            const { record, result } = await ctx.tracker.search(therapistId, directoryId);
            console.log(summarize(result));
            print({ status: record.status, candidates: result.candidates, diagnostics: result.diagnostics });
        });
    });

program
    .command('batch')
    .description('Search every given directory for every given therapist')
    .requiredOption('-t, --therapists <ids>', 'Comma-separated therapist ids', list)
    .option('-d, --directories <ids>', 'Comma-separated directory ids (default: all)', list)
    .option('-b, --budget <ms>', 'Overall time budget in ms', (v: string) => Number.parseInt(v, 10))
    .action(async (opts: { therapists: string[]; directories?: string[]; budget?: number }) => {
        await run(async (ctx) => {
            const directoryIds = opts.directories ?? ctx.orchestrator.siteIds;
            const controller = new AbortController();
            const onSignal = () => controller.abort();
            process.once('SIGINT', onSignal);
            try {
                const report = await ctx.tracker.searchBatch(opts.therapists, directoryIds, {
                    signal: controller.signal,
                    budgetMs: opts.budget ?? ctx.env.BATCH_BUDGET_MS,
                    onUnitComplete: (unit, result) => {
                        console.log(`${unit.identity_key} ${summarize(result)}`);
                    },
                });
                print({
                    units: report.units.length,
                    halted_sites: report.halted_sites,
                    cancelled: report.cancelled,
                    budget_exhausted: report.budget_exhausted,
                });
            } finally {
                process.removeListener('SIGINT', onSignal);
            }
        });
    });

program
    .command('confirm')
    .description('Record the human decision for a found profile')
    .argument('<therapistId>')
    .argument('<directoryId>')
    .argument('<status>', 'active_managed | exists_unmanaged | needs_claiming | therapist_managed')
    .option('-u, --url <url>', 'Accepted candidate profile URL')
    .action(async (therapistId: string, directoryId: string, status: string, opts: { url?: string }) => {
        await run(async (ctx) => {
            if (!isConfirmedStatus(status)) {
                throw new Error(`Invalid status "${status}"`);
            }
            print(await ctx.tracker.confirm(therapistId, directoryId, opts.url ?? null, status));
        });
    });

program
    .command('withdraw')
    .description('Deactivate a confirmed profile (kept for audit)')
    .argument('<therapistId>')
    .argument('<directoryId>')
    .option('-r, --reason <text>', 'Reason recorded in history')
    .action(async (therapistId: string, directoryId: string, opts: { reason?: string }) => {
        await run(async (ctx) => {
            print(await ctx.tracker.withdraw(therapistId, directoryId, opts.reason));
        });
    });

program
    .command('reset')
    .description('Release a record stuck in "searching" back to its previous status')
    .argument('<therapistId>')
    .argument('<directoryId>')
    .action(async (therapistId: string, directoryId: string) => {
        await run(async (ctx) => {
            print(await ctx.tracker.reset(therapistId, directoryId));
        });
    });

program
    .command('inspect')
    .description('Scrape a live profile and compare it with the stored identity')
    .argument('<therapistId>')
    .argument('<directoryId>')
    .option('-u, --url <url>', 'Profile URL (default: the confirmed one)')
    .action(async (therapistId: string, directoryId: string, opts: { url?: string }) => {
        await run(async (ctx) => {
            const { profile, comparison } = await ctx.tracker.inspect(therapistId, directoryId, opts.url);
            print({ profile, comparison });
        });
    });

program
    .command('records')
    .description('Show stored profile records')
    .argument('[therapistId]')
    .action(async (therapistId: string | undefined) => {
        await run(async (ctx) => {
            print(await ctx.repository.listProfileRecords(therapistId));
        });
    });

program.parseAsync(process.argv).catch((e: unknown) => {
    console.error('Fatal Error:', toError(e).message);
    process.exit(1);
});
