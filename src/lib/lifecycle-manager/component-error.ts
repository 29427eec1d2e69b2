import { ms } from '../unix-time-helpers';
import { toError } from '../error-to-string';

export type ComponentErrorSeverity =
  | 'information'
  | 'warning'
  | 'error'
  | 'critical';

export type ComponentErrorCode =
  | 'invalid_manifest'
  | 'duplicate_registration'
  | 'unknown_dependency'
  | 'cyclic_dependency'
  | 'dependency_excluded'
  | 'dependency_failed'
  | 'restricted_module'
  | 'load_failed'
  | 'invalid_entry_point'
  | 'attach_failed'
  | 'start_failed'
  | 'detach_failed'
  | 'timeout'
  | 'invalid_state'
  | 'reload_in_progress'
  | 'lifecycle_busy'
  | 'has_dependents'
  | 'not_found';

/**
 * Structured failure of one component in one lifecycle operation.
 *
 * Collected, not thrown at callers: `startAll`, `stopAll` and `hotReload`
 * return them in their results, and `getErrors()` keeps the history.
 */
export class ComponentError extends Error {
  public errPrefix = 'LifecycleManagerErr';
  public errType = 'Component';
  public errCode = 'ComponentFailure';
  public additionalInfo: {
    componentId: string;
    code: ComponentErrorCode;
    severity: ComponentErrorSeverity;
  };

  public readonly componentId: string;
  public readonly code: ComponentErrorCode;
  public readonly severity: ComponentErrorSeverity;
  /** Unix ms */
  public readonly timestamp: number;

  constructor(
    info: {
      componentId: string;
      code: ComponentErrorCode;
      severity: ComponentErrorSeverity;
      message: string;
    },
    options?: { cause?: unknown },
  ) {
    super(info.message, options);
    this.name = 'ComponentError';
    this.componentId = info.componentId;
    this.code = info.code;
    this.severity = info.severity;
    this.timestamp = ms();
    this.additionalInfo = {
      componentId: info.componentId,
      code: info.code,
      severity: info.severity,
    };
  }

  public static information(
    componentId: string,
    code: ComponentErrorCode,
    message: string,
    cause?: unknown,
  ): ComponentError {
    return new ComponentError(
      { componentId, code, severity: 'information', message },
      { cause },
    );
  }

  public static warning(
    componentId: string,
    code: ComponentErrorCode,
    message: string,
    cause?: unknown,
  ): ComponentError {
    return new ComponentError(
      { componentId, code, severity: 'warning', message },
      { cause },
    );
  }

  public static error(
    componentId: string,
    code: ComponentErrorCode,
    message: string,
    cause?: unknown,
  ): ComponentError {
    return new ComponentError(
      { componentId, code, severity: 'error', message },
      { cause },
    );
  }

  public static critical(
    componentId: string,
    code: ComponentErrorCode,
    message: string,
    cause?: unknown,
  ): ComponentError {
    return new ComponentError(
      { componentId, code, severity: 'critical', message },
      { cause },
    );
  }

  /**
   * Wraps whatever was thrown; the message is the thrown error's message
   * unless one is given
   */
  public static fromException(
    componentId: string,
    code: ComponentErrorCode,
    exception: unknown,
    options: { severity?: ComponentErrorSeverity; message?: string } = {},
  ): ComponentError {
    return new ComponentError(
      {
        componentId,
        code,
        severity: options.severity ?? 'error',
        message: options.message ?? toError(exception).message,
      },
      { cause: exception },
    );
  }

  public get isCritical(): boolean {
    return this.severity === 'critical';
  }
}
