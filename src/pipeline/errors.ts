export type DecodeErrorCode =
  | "TRUNCATED"
  | "UNKNOWN_VERSION"
  | "UNKNOWN_PAYLOAD_TYPE"
  | "CHECKSUM_MISMATCH"
  | "PAYLOAD_TOO_LARGE"
  | "TRAILING_BYTES"
  | "MALFORMED_PAYLOAD";

/** Malformed, truncated or unversioned frame. Dropped and logged; the link continues. */
export class DecodeError extends Error {
  readonly code: DecodeErrorCode;

  constructor(code: DecodeErrorCode, message: string) {
    super(message);
    this.name = "DecodeError";
    this.code = code;
  }
}

export type EncodeErrorCode = "PAYLOAD_TOO_LARGE" | "SEQUENCE_OUT_OF_RANGE" | "EPOCH_OUT_OF_RANGE" | "ID_TOO_LONG";

/** A message that cannot be framed. Returned from the send that carried it. */
export class EncodeError extends Error {
  readonly code: EncodeErrorCode;

  constructor(code: EncodeErrorCode, message: string) {
    super(message);
    this.name = "EncodeError";
    this.code = code;
  }
}

/** Retry budget exhausted for one sequence on a link. */
export class LinkDegraded extends Error {
  readonly code = "LINK_DEGRADED";
  readonly peerId: string;
  readonly sequence: number;
  readonly attempts: number;

  constructor(params: { peerId: string; sequence: number; attempts: number }) {
    super(
      `link to ${params.peerId} degraded: seq ${params.sequence} unacknowledged after ${params.attempts} attempts`,
    );
    this.name = "LinkDegraded";
    this.peerId = params.peerId;
    this.sequence = params.sequence;
    this.attempts = params.attempts;
  }
}

export class LinkClosed extends Error {
  readonly code = "LINK_CLOSED";

  constructor(peerId: string) {
    super(`link to ${peerId} is closed`);
    this.name = "LinkClosed";
  }
}

/** A queued send replaced by a newer message of the same type before it was transmitted. */
export class SendSuperseded extends Error {
  readonly code = "SEND_SUPERSEDED";
  readonly sequence: number;

  constructor(peerId: string, sequence: number) {
    super(`send to ${peerId} seq ${sequence} superseded by a newer message`);
    this.name = "SendSuperseded";
    this.sequence = sequence;
  }
}

/** Topology misconfiguration. Fatal at startup. */
export class UnknownPeer extends Error {
  readonly code = "UNKNOWN_PEER";
  readonly peerName: string;

  constructor(peerName: string, detail?: string) {
    super(`unknown peer "${peerName}"${detail ? `: ${detail}` : ""}`);
    this.name = "UnknownPeer";
    this.peerName = peerName;
  }
}

export class EmptyTrainingSplit extends Error {
  readonly code = "EMPTY_TRAINING_SPLIT";
  readonly trainSize: number;
  readonly testSize: number;

  constructor(trainSize: number, testSize: number) {
    super(`empty training split (train=${trainSize}, test=${testSize})`);
    this.name = "EmptyTrainingSplit";
    this.trainSize = trainSize;
    this.testSize = testSize;
  }
}

export class ActuatorWriteFailure extends Error {
  readonly code = "ACTUATOR_WRITE_FAILURE";
  readonly command: string;

  constructor(command: string, reason: string) {
    super(`actuator rejected "${command}": ${reason}`);
    this.name = "ActuatorWriteFailure";
    this.command = command;
  }
}

export class ConfigError extends Error {
  readonly code = "CONFIG_ERROR";

  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
