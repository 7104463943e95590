export class MonitorError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
  }
}

// Whole cycle aborts; recorded as a zero-shipment run
export class SnapshotUnavailableError extends MonitorError {}

export class RuleEvaluationError extends MonitorError {
  constructor(
    public readonly shipmentId: string,
    public readonly rule: string,
    cause: unknown,
  ) {
    super(`Rule ${rule} failed for shipment ${shipmentId}`, cause);
  }
}

export class DispatchTransportError extends MonitorError {
  constructor(
    message: string,
    public readonly transient: boolean,
    public readonly status?: number,
    cause?: unknown,
  ) {
    super(message, cause);
  }
}

export class PersistenceError extends MonitorError {}

export class ClassificationError extends MonitorError {}

export class NotFoundError extends MonitorError {}
