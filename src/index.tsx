import {render} from 'ink';
import App from './app.js';
import type {SessionController} from './ui/state/controller.js';

export interface RuntimeProps {
	controller: SessionController;
}

/** Renders the session and resolves once the user quits. */
export const runInteractiveApp = async ({
	controller,
}: RuntimeProps): Promise<void> => {
	const instance = render(<App controller={controller} />, {
		exitOnCtrlC: true,
	});
	await instance.waitUntilExit();
};
