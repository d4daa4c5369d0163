/**
 * Guider Protocol Definitions
 *
 * Wire shapes for the JSON-RPC session with the guiding application and the
 * event notifications it pushes on the same connection.
 * @module
 */

import * as rt from 'runtypes';

/**
 * Names of every event a subscriber can observe.
 *
 * Remote events keep the tag the guiding application sends in its `Event`
 * field. Lifecycle events are published by the client itself.
 */
export enum GuiderEventType {
	VERSION = 'Version',
	APP_STATE = 'AppState',
	GUIDE_STEP = 'GuideStep',
	GUIDING_DITHERED = 'GuidingDithered',
	SETTLE_DONE = 'SettleDone',
	SETTLING = 'Settling',
	STAR_SELECTED = 'StarSelected',
	STAR_LOST = 'StarLost',
	LOCK_POSITION_SET = 'LockPositionSet',
	LOCK_POSITION_LOST = 'LockPositionLost',
	LOCK_POSITION_SHIFT_LIMIT_REACHED = 'LockPositionShiftLimitReached',
	START_CALIBRATION = 'StartCalibration',
	CALIBRATING = 'Calibrating',
	CALIBRATION_COMPLETE = 'CalibrationComplete',
	CALIBRATION_FAILED = 'CalibrationFailed',
	CALIBRATION_DATA_FLIPPED = 'CalibrationDataFlipped',
	LOOPING_EXPOSURES = 'LoopingExposures',
	LOOPING_EXPOSURES_STOPPED = 'LoopingExposuresStopped',
	PAUSED = 'Paused',
	RESUMED = 'Resumed',
	GUIDE_PARAM_CHANGE = 'GuideParamChange',
	CONFIGURATION_CHANGE = 'ConfigurationChange',
	ALERT = 'Alert',
	START_GUIDING = 'StartGuiding',
	GUIDING_STOPPED = 'GuidingStopped',

	CONNECTION_LOST = 'ConnectionLost',
	RECONNECTING = 'Reconnecting',
	RECONNECTED = 'Reconnected',
	RECONNECT_FAILED = 'ReconnectFailed',

	/** A remote event this client does not model, kept for forward compatibility */
	UNRECOGNIZED = 'Unrecognized',
}

/**
 * Application states reported by `AppState` events and `get_app_state`.
 */
export enum AppState {
	STOPPED = 'Stopped',
	SELECTED = 'Selected',
	CALIBRATING = 'Calibrating',
	GUIDING = 'Guiding',
	LOST_LOCK = 'LostLock',
	PAUSED = 'Paused',
	LOOPING = 'Looping',
}

export const AppStateRT = rt.Union(
	rt.Literal(AppState.STOPPED),
	rt.Literal(AppState.SELECTED),
	rt.Literal(AppState.CALIBRATING),
	rt.Literal(AppState.GUIDING),
	rt.Literal(AppState.LOST_LOCK),
	rt.Literal(AppState.PAUSED),
	rt.Literal(AppState.LOOPING),
);

// --- Calls and responses ---

/** Parameters of a call: named (object) or positional (array). */
export type RpcParams = Record<string, unknown> | unknown[];

/**
 * Outgoing call. `params` is omitted when the method takes none.
 */
export interface RpcRequest {
	method: string;
	params?: RpcParams;
	id: number;
}

export const RpcIdRT = rt.Number.withConstraint((n) => Number.isSafeInteger(n) || 'Identifier must be an integer');

export const RpcErrorRT = rt.Record({
	code: rt.Number,
	message: rt.String,
	data: rt.Unknown.optional(),
});

export const RpcResponseRT = rt.Record({
	id: RpcIdRT,
	jsonrpc: rt.String.optional(),
	result: rt.Unknown.optional(),
	error: RpcErrorRT.optional(),
});

export type RpcError = rt.Static<typeof RpcErrorRT>;
export type RpcResponse = rt.Static<typeof RpcResponseRT>;

/**
 * Serializes a call into one wire line (without the terminator).
 */
export function encodeRequest(request: RpcRequest): string {
	const { method, params, id } = request;
	return JSON.stringify(params === undefined ? { method, id } : { method, params, id });
}

// --- Remote events ---

/**
 * Fields the guiding application attaches to every event.
 */
const EventBaseRT = rt.Record({
	Timestamp: rt.Number.optional(),
	Host: rt.String.optional(),
	Inst: rt.Number.optional(),
});

export const VersionEventRT = EventBaseRT.And(rt.Record({
	Event: rt.Literal(GuiderEventType.VERSION),
	PHDVersion: rt.String,
	PHDSubver: rt.String.optional(),
	MsgVersion: rt.Number.optional(),
	OverlapSupport: rt.Boolean.optional(),
}));

export const AppStateEventRT = EventBaseRT.And(rt.Record({
	Event: rt.Literal(GuiderEventType.APP_STATE),
	State: rt.String,
}));

export const GuideStepEventRT = EventBaseRT.And(rt.Record({
	Event: rt.Literal(GuiderEventType.GUIDE_STEP),
	Frame: rt.Number.optional(),
	Time: rt.Number.optional(),
	Mount: rt.String.optional(),
	dx: rt.Number.optional(),
	dy: rt.Number.optional(),
	RADistanceRaw: rt.Number.optional(),
	DECDistanceRaw: rt.Number.optional(),
	RADistanceGuide: rt.Number.optional(),
	DECDistanceGuide: rt.Number.optional(),
	RADuration: rt.Number.optional(),
	RADirection: rt.String.optional(),
	DECDuration: rt.Number.optional(),
	DECDirection: rt.String.optional(),
	StarMass: rt.Number.optional(),
	SNR: rt.Number.optional(),
	HFD: rt.Number.optional(),
	AvgDist: rt.Number.optional(),
	RALimited: rt.Boolean.optional(),
	DecLimited: rt.Boolean.optional(),
	ErrorCode: rt.Number.optional(),
}));

export const GuidingDitheredEventRT = EventBaseRT.And(rt.Record({
	Event: rt.Literal(GuiderEventType.GUIDING_DITHERED),
	dx: rt.Number.optional(),
	dy: rt.Number.optional(),
}));

export const SettleDoneEventRT = EventBaseRT.And(rt.Record({
	Event: rt.Literal(GuiderEventType.SETTLE_DONE),
	Status: rt.Number.optional(),
	Error: rt.String.optional(),
	TotalFrames: rt.Number.optional(),
	DroppedFrames: rt.Number.optional(),
}));

export const SettlingEventRT = EventBaseRT.And(rt.Record({
	Event: rt.Literal(GuiderEventType.SETTLING),
	Distance: rt.Number.optional(),
	Time: rt.Number.optional(),
	SettleTime: rt.Number.optional(),
	StarLocked: rt.Boolean.optional(),
}));

export const StarSelectedEventRT = EventBaseRT.And(rt.Record({
	Event: rt.Literal(GuiderEventType.STAR_SELECTED),
	X: rt.Number.optional(),
	Y: rt.Number.optional(),
}));

export const StarLostEventRT = EventBaseRT.And(rt.Record({
	Event: rt.Literal(GuiderEventType.STAR_LOST),
	Frame: rt.Number.optional(),
	Time: rt.Number.optional(),
	StarMass: rt.Number.optional(),
	SNR: rt.Number.optional(),
	AvgDist: rt.Number.optional(),
	ErrorCode: rt.Number.optional(),
	Status: rt.String.optional(),
}));

export const LockPositionSetEventRT = EventBaseRT.And(rt.Record({
	Event: rt.Literal(GuiderEventType.LOCK_POSITION_SET),
	X: rt.Number.optional(),
	Y: rt.Number.optional(),
}));

export const LockPositionLostEventRT = EventBaseRT.And(rt.Record({
	Event: rt.Literal(GuiderEventType.LOCK_POSITION_LOST),
}));

export const LockPositionShiftLimitReachedEventRT = EventBaseRT.And(rt.Record({
	Event: rt.Literal(GuiderEventType.LOCK_POSITION_SHIFT_LIMIT_REACHED),
}));

export const StartCalibrationEventRT = EventBaseRT.And(rt.Record({
	Event: rt.Literal(GuiderEventType.START_CALIBRATION),
	Mount: rt.String.optional(),
}));

export const CalibratingEventRT = EventBaseRT.And(rt.Record({
	Event: rt.Literal(GuiderEventType.CALIBRATING),
	Mount: rt.String.optional(),
	dir: rt.String.optional(),
	dist: rt.Number.optional(),
	dx: rt.Number.optional(),
	dy: rt.Number.optional(),
	pos: rt.Array(rt.Number).optional(),
	step: rt.Number.optional(),
	State: rt.String.optional(),
}));

export const CalibrationCompleteEventRT = EventBaseRT.And(rt.Record({
	Event: rt.Literal(GuiderEventType.CALIBRATION_COMPLETE),
	Mount: rt.String.optional(),
}));

export const CalibrationFailedEventRT = EventBaseRT.And(rt.Record({
	Event: rt.Literal(GuiderEventType.CALIBRATION_FAILED),
	Reason: rt.String.optional(),
}));

export const CalibrationDataFlippedEventRT = EventBaseRT.And(rt.Record({
	Event: rt.Literal(GuiderEventType.CALIBRATION_DATA_FLIPPED),
	Mount: rt.String.optional(),
}));

export const LoopingExposuresEventRT = EventBaseRT.And(rt.Record({
	Event: rt.Literal(GuiderEventType.LOOPING_EXPOSURES),
	Frame: rt.Number.optional(),
}));

export const LoopingExposuresStoppedEventRT = EventBaseRT.And(rt.Record({
	Event: rt.Literal(GuiderEventType.LOOPING_EXPOSURES_STOPPED),
}));

export const PausedEventRT = EventBaseRT.And(rt.Record({
	Event: rt.Literal(GuiderEventType.PAUSED),
}));

export const ResumedEventRT = EventBaseRT.And(rt.Record({
	Event: rt.Literal(GuiderEventType.RESUMED),
}));

export const GuideParamChangeEventRT = EventBaseRT.And(rt.Record({
	Event: rt.Literal(GuiderEventType.GUIDE_PARAM_CHANGE),
	Name: rt.String.optional(),
	Value: rt.Unknown.optional(),
}));

export const ConfigurationChangeEventRT = EventBaseRT.And(rt.Record({
	Event: rt.Literal(GuiderEventType.CONFIGURATION_CHANGE),
}));

export const AlertEventRT = EventBaseRT.And(rt.Record({
	Event: rt.Literal(GuiderEventType.ALERT),
	Msg: rt.String.optional(),
	Type: rt.String.optional(),
}));

export const StartGuidingEventRT = EventBaseRT.And(rt.Record({
	Event: rt.Literal(GuiderEventType.START_GUIDING),
}));

export const GuidingStoppedEventRT = EventBaseRT.And(rt.Record({
	Event: rt.Literal(GuiderEventType.GUIDING_STOPPED),
}));

/**
 * Union validator for every remote event this client models.
 */
export const RemoteEventRT = rt.Union(
	VersionEventRT,
	AppStateEventRT,
	GuideStepEventRT,
	GuidingDitheredEventRT,
	SettleDoneEventRT,
	SettlingEventRT,
	StarSelectedEventRT,
	StarLostEventRT,
	LockPositionSetEventRT,
	LockPositionLostEventRT,
	LockPositionShiftLimitReachedEventRT,
	StartCalibrationEventRT,
	CalibratingEventRT,
	CalibrationCompleteEventRT,
	CalibrationFailedEventRT,
	CalibrationDataFlippedEventRT,
	LoopingExposuresEventRT,
	LoopingExposuresStoppedEventRT,
	PausedEventRT,
	ResumedEventRT,
	GuideParamChangeEventRT,
	ConfigurationChangeEventRT,
	AlertEventRT,
	StartGuidingEventRT,
	GuidingStoppedEventRT,
);

export type RemoteEvent = rt.Static<typeof RemoteEventRT>;
export type VersionEvent = rt.Static<typeof VersionEventRT>;
export type AppStateEvent = rt.Static<typeof AppStateEventRT>;
export type GuideStepEvent = rt.Static<typeof GuideStepEventRT>;
export type StarLostEvent = rt.Static<typeof StarLostEventRT>;

const CLIENT_EVENT_TYPES: ReadonlySet<GuiderEventType> = new Set([
	GuiderEventType.CONNECTION_LOST,
	GuiderEventType.RECONNECTING,
	GuiderEventType.RECONNECTED,
	GuiderEventType.RECONNECT_FAILED,
	GuiderEventType.UNRECOGNIZED,
]);

/**
 * Tags of the remote events modeled above.
 */
export const REMOTE_EVENT_NAMES: ReadonlySet<string> = new Set<string>(
	Object.values(GuiderEventType).filter((name) => !CLIENT_EVENT_TYPES.has(name)),
);

// --- Client-side events ---

export interface ConnectionLostEvent {
	Event: GuiderEventType.CONNECTION_LOST;
	reason: string;
}

export interface ReconnectingEvent {
	Event: GuiderEventType.RECONNECTING;
	attempt: number;
	/** Absent when retries are unlimited */
	maxAttempts?: number;
}

export interface ReconnectedEvent {
	Event: GuiderEventType.RECONNECTED;
}

export interface ReconnectFailedEvent {
	Event: GuiderEventType.RECONNECT_FAILED;
	reason: string;
}

export type LifecycleEvent = ConnectionLostEvent | ReconnectingEvent | ReconnectedEvent | ReconnectFailedEvent;

/**
 * A remote event with a tag this client does not model (or whose payload
 * does not match the model). Delivered as-is, never treated as an error.
 */
export interface UnrecognizedEvent {
	Event: GuiderEventType.UNRECOGNIZED;
	/** The tag as sent by the remote side */
	name: string;
	/** Every field of the message except the tag */
	payload: Record<string, unknown>;
}

/**
 * Everything a subscription can yield, discriminated by `Event`.
 */
export type GuiderEvent = RemoteEvent | LifecycleEvent | UnrecognizedEvent;
