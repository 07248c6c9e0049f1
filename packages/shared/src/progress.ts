/**
 * Progress reporting for graph loading and routing runs.
 *
 * Operations accept a `ProgressListener` callback and emit `ProgressEvent`s
 * (CustomEvents named "progress"). The default listener writes to the console;
 * `dispatchProgress` forwards events to an EventTarget instead.
 *
 * @module
 */

/** Severity of a progress message. */
export type ProgressLevel = "info" | "warn"

/**
 * Progress payload containing a message, its level and a timestamp.
 */
export type Progress = {
	msg: string
	level: ProgressLevel
	timestamp: number
}

/** CustomEvent carrying progress details. */
export interface ProgressEvent extends CustomEvent<Progress> {}

/** Callback receiving progress events. */
export type ProgressListener = (progress: ProgressEvent) => void

/**
 * Create a Progress payload stamped with the current time.
 */
export function progress(msg: string, level: ProgressLevel = "info"): Progress {
	return {
		msg,
		level,
		timestamp: Date.now(),
	}
}

/**
 * Create a ProgressEvent with the given message.
 * @param msg - The progress message.
 * @param level - "warn" for results the caller should not trust as-is.
 */
export function progressEvent(
	msg: string,
	level: ProgressLevel = "info",
): ProgressEvent {
	return new CustomEvent("progress", { detail: progress(msg, level) })
}

export function progressEventMessage(event: ProgressEvent): string {
	return event.detail.msg
}

/**
 * Log a progress event's message to the console, warnings via `console.warn`.
 */
export function logProgress(progress: ProgressEvent) {
	const msg = progressEventMessage(progress)
	if (progress.detail.level === "warn") console.warn(msg)
	else console.log(msg)
}

/** Listener that drops every event. */
export function ignoreProgress(_progress: ProgressEvent) {}

/**
 * Listener that re-dispatches every event on `target`, so any number of
 * `addEventListener("progress", ...)` subscribers receive it.
 */
export function dispatchProgress(target: EventTarget): ProgressListener {
	return (progress) => {
		target.dispatchEvent(progress)
	}
}
