const FORMAT_UNITS = ['B', 'KB', 'MB', 'GB', 'TB', 'PB'];

const toValidDate = (value: Date | number | null | undefined): Date | null => {
	if (value === null || value === undefined) return null;

	const date = value instanceof Date ? value : new Date(value);
	if (Number.isNaN(date.getTime())) return null;

	return date;
};

export const human = (bytes: number | null | undefined): string => {
	if (bytes === 0) return '0 B';
	if (typeof bytes !== 'number' || !Number.isFinite(bytes) || bytes < 0) {
		return '-';
	}

	const unitIndex = Math.min(
		Math.floor(Math.log(bytes) / Math.log(1024)),
		FORMAT_UNITS.length - 1,
	);
	const value = bytes / 1024 ** unitIndex;
	const decimals = value >= 10 || unitIndex === 0 ? 0 : 1;

	return `${value.toFixed(decimals)} ${FORMAT_UNITS[unitIndex]}`;
};

const pad2 = (value: number): string => String(value).padStart(2, '0');

/** Local `YYYY-MM-DD HH:mm`, or an empty string for invalid input. */
export const formatTimestamp = (
	value: Date | number | null | undefined,
): string => {
	const date = toValidDate(value);
	if (!date) return '';

	return `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())} ${pad2(date.getHours())}:${pad2(date.getMinutes())}`;
};
