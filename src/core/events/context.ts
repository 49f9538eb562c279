/**
 * EventContext
 *
 * Payload handed to every handler of one event firing. Instances are frozen;
 * each `with*` call returns a new context, so handlers cannot change what the
 * next handler sees.
 */

export interface EventContextData {
  /** VCS / repository summary collected at startup */
  sessionContext?: string;
  userMessage?: string;
  toolName?: string;
  toolOutput?: string;
  error?: string;
  warning?: string;
  metadata: Readonly<Record<string, string>>;
}

export class EventContext implements Readonly<EventContextData> {
  readonly sessionContext?: string;
  readonly userMessage?: string;
  readonly toolName?: string;
  readonly toolOutput?: string;
  readonly error?: string;
  readonly warning?: string;
  readonly metadata: Readonly<Record<string, string>>;

  constructor(data: Partial<EventContextData> = {}) {
    this.sessionContext = data.sessionContext;
    this.userMessage = data.userMessage;
    this.toolName = data.toolName;
    this.toolOutput = data.toolOutput;
    this.error = data.error;
    this.warning = data.warning;
    this.metadata = Object.freeze({ ...(data.metadata ?? {}) });
    Object.freeze(this);
  }

  static empty(): EventContext {
    return new EventContext();
  }

  withSessionContext(sessionContext: string): EventContext {
    return this.extend({ sessionContext });
  }

  withUserMessage(userMessage: string): EventContext {
    return this.extend({ userMessage });
  }

  withToolName(toolName: string): EventContext {
    return this.extend({ toolName });
  }

  withToolOutput(toolOutput: string): EventContext {
    return this.extend({ toolOutput });
  }

  withError(error: string): EventContext {
    return this.extend({ error });
  }

  withWarning(warning: string): EventContext {
    return this.extend({ warning });
  }

  withMetadata(key: string, value: string): EventContext {
    return this.extend({ metadata: { ...this.metadata, [key]: value } });
  }

  /**
   * Plain object form, written to hook commands on stdin
   */
  toJSON(): EventContextData {
    const data: EventContextData = { metadata: { ...this.metadata } };
    if (this.sessionContext !== undefined) data.sessionContext = this.sessionContext;
    if (this.userMessage !== undefined) data.userMessage = this.userMessage;
    if (this.toolName !== undefined) data.toolName = this.toolName;
    if (this.toolOutput !== undefined) data.toolOutput = this.toolOutput;
    if (this.error !== undefined) data.error = this.error;
    if (this.warning !== undefined) data.warning = this.warning;
    return data;
  }

  private extend(patch: Partial<EventContextData>): EventContext {
    return new EventContext({ ...this.toJSON(), ...patch });
  }
}
