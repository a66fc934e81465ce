/**
 * Video Note Processing Types
 *
 * Type definitions for the inbound attachment → video note flow.
 *
 * @module types/videoNote
 */

/**
 * Kind of payload an attachment reference was taken from
 */
export type AttachmentKind = 'video' | 'document';

/**
 * Identifies a remote file to turn into a video note
 */
export interface AttachmentReference {
	kind: AttachmentKind;
	/** Opaque Telegram file id */
	fileId: string;
	/** Display name as sent by the client */
	fileName?: string;
}

/**
 * Outcome of resolving a message into an attachment
 */
export type AttachmentResolution =
	| (AttachmentReference & { kind: 'video' })
	| (AttachmentReference & { kind: 'document' })
	| { kind: 'none' };

/**
 * Terminal state of one request
 */
export type RequestOutcome =
	| 'success'
	| 'validation_failure'
	| 'download_failure'
	| 'transcode_failure'
	| 'upload_failure';

/**
 * Input and output temp paths owned by one request
 */
export interface TempFilePair {
	inputPath: string;
	outputPath: string;
}

/**
 * Result of processing one video message
 */
export interface VideoNoteProcessingResult {
	/** Which terminal state the request reached */
	outcome: RequestOutcome;
	/** Total processing time in milliseconds */
	processingTime: number;
	/** Message of the error that ended the request, if any */
	error?: string;
}

/**
 * Options for a single transcoder run
 */
export interface TranscodeOptions {
	/** Side length of the square output */
	size: number;
	/** Executable name or path */
	ffmpegPath: string;
	/** Kills the process when aborted */
	signal?: AbortSignal;
}
