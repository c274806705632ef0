import type {ConfirmAction} from '../types.js';

export const RETENTION_DAYS_TITLE = 'Retention Days';
export const SCAN_PATH_TITLE = 'Scan Path';
export const CREDENTIAL_TITLE = 'Enter sudo password';

/** Requests a popup hands back to the session controller. */
export type PopupCommand =
	| {
			type: 'open-input';
			title: string;
			initial: string;
	  }
	| {
			type: 'open-dir-browse';
	  }
	| {
			type: 'toggle-removal';
	  }
	| {
			type: 'set-value';
			key: string;
			value: string;
	  }
	| {
			type: 'delete-artifact';
	  }
	| {
			type: 'rebuild-artifact';
	  }
	| {
			type: 'clear-all-builds';
	  }
	| {
			type: 'confirm-action';
			action: ConfirmAction;
	  }
	| {
			type: 'open-excluded-paths';
	  };
