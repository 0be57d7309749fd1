/**
 * Error type definitions
 */

export enum ErrorType {
  CONFIG_ERROR = 'CONFIG_ERROR',
  ACCESS_ERROR = 'ACCESS_ERROR',
  NOT_FOUND_ERROR = 'NOT_FOUND_ERROR',
  MALFORMED_RECORD = 'MALFORMED_RECORD',
  TRANSPORT_ERROR = 'TRANSPORT_ERROR',
  OUTPUT_ERROR = 'OUTPUT_ERROR',
}

export interface ExporterErrorInfo {
  type: ErrorType;
  code: string;
  message: string;
  details?: unknown;
  recoverable: boolean;
  suggestions?: string[];
}

export class ExporterError extends Error implements ExporterErrorInfo {
  type: ErrorType;
  code: string;
  recoverable: boolean;
  details?: unknown;
  suggestions?: string[];

  constructor(
    type: ErrorType,
    code: string,
    message: string,
    options?: {
      details?: unknown;
      recoverable?: boolean;
      suggestions?: string[];
    }
  ) {
    super(message);
    this.name = 'ExporterError';
    this.type = type;
    this.code = code;
    this.recoverable = options?.recoverable ?? true;
    this.details = options?.details;
    this.suggestions = options?.suggestions;
  }

  toJSON(): ExporterErrorInfo {
    return {
      type: this.type,
      code: this.code,
      message: this.message,
      details: this.details,
      recoverable: this.recoverable,
      suggestions: this.suggestions,
    };
  }
}

/**
 * Required option missing or invalid for an enabled feature
 */
export class ConfigurationError extends ExporterError {
  readonly field: string;

  constructor(field: string, message: string) {
    super(ErrorType.CONFIG_ERROR, 'INVALID_CONFIG', message, {
      recoverable: false,
      details: { field },
    });
    this.name = 'ConfigurationError';
    this.field = field;
  }
}

/**
 * Calendar store authorization denied or store unreachable
 */
export class CalendarAccessError extends ExporterError {
  constructor(message: string, details?: unknown) {
    super(ErrorType.ACCESS_ERROR, 'CALENDAR_ACCESS_DENIED', message, {
      recoverable: false,
      details,
      suggestions: [
        'Grant calendar access in System Settings > Privacy & Security > Calendars',
        'Set useMockOnFailure to export fixture data instead',
      ],
    });
    this.name = 'CalendarAccessError';
  }
}

/**
 * A named calendar does not exist in the store
 */
export class CalendarNotFoundError extends ExporterError {
  readonly calendarName: string;

  constructor(calendarName: string) {
    super(ErrorType.NOT_FOUND_ERROR, 'CALENDAR_NOT_FOUND', `Calendar '${calendarName}' not found`, {
      recoverable: true,
      details: { calendarName },
      suggestions: ['Run "calendar-exporter list-calendars" to see available calendar names'],
    });
    this.name = 'CalendarNotFoundError';
    this.calendarName = calendarName;
  }
}

export class TransportError extends ExporterError {
  constructor(message: string, details?: unknown) {
    super(ErrorType.TRANSPORT_ERROR, 'TRANSPORT_FAILURE', message, {
      recoverable: true,
      details,
    });
    this.name = 'TransportError';
  }
}

export class ErrorHandler {
  static handle(error: Error, context: string): ExporterErrorInfo {
    if (error instanceof ExporterError) {
      return error.toJSON();
    }

    // Classify unknown errors
    const errorMessage = error.message.toLowerCase();

    if (
      errorMessage.includes('not authorized') ||
      errorMessage.includes('not allowed') ||
      errorMessage.includes('access') ||
      errorMessage.includes('permission')
    ) {
      return {
        type: ErrorType.ACCESS_ERROR,
        code: 'CALENDAR_ACCESS_DENIED',
        message: `Calendar access failed: ${context}`,
        details: error.message,
        recoverable: false,
        suggestions: ['Grant calendar access to the terminal or launch agent running the exporter'],
      };
    }

    if (errorMessage.includes('not found') || errorMessage.includes("doesn't exist")) {
      return {
        type: ErrorType.NOT_FOUND_ERROR,
        code: 'NOT_FOUND',
        message: `Not found: ${context}`,
        details: error.message,
        recoverable: true,
      };
    }

    if (
      errorMessage.includes('timed out') ||
      errorMessage.includes('econnrefused') ||
      errorMessage.includes('econnreset') ||
      errorMessage.includes('authentication')
    ) {
      return {
        type: ErrorType.TRANSPORT_ERROR,
        code: 'TRANSPORT_FAILURE',
        message: `Transfer failed: ${context}`,
        details: error.message,
        recoverable: true,
        suggestions: ['Check the SFTP host, port and credentials'],
      };
    }

    return {
      type: ErrorType.ACCESS_ERROR,
      code: 'CALENDAR_STORE_UNAVAILABLE',
      message: `Unexpected error: ${context}`,
      details: error.message,
      recoverable: false,
    };
  }

  /**
   * Normalize a thrown value into an Error
   */
  static toError(value: unknown): Error {
    return value instanceof Error ? value : new Error(String(value));
  }

  static getSuggestions(error: ExporterErrorInfo): string[] {
    return error.suggestions ?? [];
  }
}
