import process from 'node:process';
import { cli } from 'gunshi';
import { description, name, version } from '../../package.json';
import { dailyCommand } from './daily.ts';
import { eventsCommand } from './events.ts';
import { liveCommand } from './live.ts';
import { sessionsCommand } from './sessions.ts';

const subCommands = {
	daily: dailyCommand,
	live: liveCommand,
	sessions: sessionsCommand,
	events: eventsCommand,
};

export async function run(): Promise<void> {
	await cli(process.argv.slice(2), dailyCommand, {
		name,
		version,
		description,
		subCommands,
		renderHeader: null,
	});
}
