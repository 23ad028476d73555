/**
 * Structured error handling for the ledger node
 * Classifies failures, keeps a bounded in-memory log and reports statistics
 */
import type { BaseLogger } from 'pino';
import { logger as defaultLogger } from '../config/logger.config.js';
import { isChainError } from '../ledger/errors.js';
import type { ChainErrorCategory } from '../ledger/errors.js';

export enum ErrorType {
  STRUCTURAL_ERROR = 'STRUCTURAL_ERROR',
  LEDGER_ERROR = 'LEDGER_ERROR',
  CONSENSUS_ERROR = 'CONSENSUS_ERROR',
  MINING_ERROR = 'MINING_ERROR',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  SYSTEM_ERROR = 'SYSTEM_ERROR'
}

export enum ErrorSeverity {
  LOW = 'LOW',
  MEDIUM = 'MEDIUM',
  HIGH = 'HIGH',
  CRITICAL = 'CRITICAL'
}

export interface ErrorContext {
  operation: string;
  blockHeight?: number;
  accountId?: string;
  transactionIndex?: number;
  additionalData?: Record<string, unknown>;
}

export interface StructuredError {
  type: ErrorType;
  severity: ErrorSeverity;
  message: string;
  code?: string;
  originalError?: Error;
  context: ErrorContext;
  timestamp: Date;
  recoverable: boolean;
}

export interface ErrorStatistics {
  totalErrors: number;
  recentErrors: number;
  dailyErrors: number;
  errorsByType: Partial<Record<ErrorType, number>>;
  errorsBySeverity: Partial<Record<ErrorSeverity, number>>;
  lastError: StructuredError | null;
}

interface ErrorClassification {
  type: ErrorType;
  severity: ErrorSeverity;
  recoverable: boolean;
}

const CHAIN_ERROR_CLASSIFICATION: Record<ChainErrorCategory, ErrorClassification> = {
  // A block that fails structural checks was built wrong or tampered with
  structural: { type: ErrorType.STRUCTURAL_ERROR, severity: ErrorSeverity.HIGH, recoverable: true },
  ledger: { type: ErrorType.LEDGER_ERROR, severity: ErrorSeverity.MEDIUM, recoverable: true },
  consensus: { type: ErrorType.CONSENSUS_ERROR, severity: ErrorSeverity.LOW, recoverable: true }
};

export class ErrorHandler {
  private static instance: ErrorHandler;
  private errorLog: StructuredError[] = [];
  private readonly maxLogSize = 1000;

  constructor(private readonly logger: BaseLogger = defaultLogger) { }

  static getInstance(): ErrorHandler {
    if (!ErrorHandler.instance) {
      ErrorHandler.instance = new ErrorHandler();
    }
    return ErrorHandler.instance;
  }

  /**
   * Create a structured error from a raw error
   * @param error The original error
   * @param context Context information about where the error occurred
   * @returns StructuredError with classification and metadata
   */
  createStructuredError(error: Error | string, context: ErrorContext): StructuredError {
    const errorMessage = error instanceof Error ? error.message : error;
    const originalError = error instanceof Error ? error : undefined;

    const { type, severity, recoverable } = this.classifyError(error);

    const structuredError: StructuredError = {
      type,
      severity,
      message: errorMessage,
      code: isChainError(error) ? error.code : undefined,
      originalError,
      context,
      timestamp: new Date(),
      recoverable
    };

    this.logError(structuredError);

    return structuredError;
  }

  /**
   * Get error statistics for monitoring
   */
  getErrorStatistics(): ErrorStatistics {
    const now = new Date();
    const oneHourAgo = new Date(now.getTime() - 60 * 60 * 1000);
    const oneDayAgo = new Date(now.getTime() - 24 * 60 * 60 * 1000);

    const recentErrors = this.errorLog.filter(e => e.timestamp >= oneHourAgo);
    const dailyErrors = this.errorLog.filter(e => e.timestamp >= oneDayAgo);

    const errorsByType: Partial<Record<ErrorType, number>> = {};
    const errorsBySeverity: Partial<Record<ErrorSeverity, number>> = {};
    for (const error of this.errorLog) {
      errorsByType[error.type] = (errorsByType[error.type] || 0) + 1;
      errorsBySeverity[error.severity] = (errorsBySeverity[error.severity] || 0) + 1;
    }

    return {
      totalErrors: this.errorLog.length,
      recentErrors: recentErrors.length,
      dailyErrors: dailyErrors.length,
      errorsByType,
      errorsBySeverity,
      lastError: this.errorLog[this.errorLog.length - 1] || null
    };
  }

  /**
   * Drop log entries older than a day
   */
  clearOldErrors(): void {
    const oneDayAgo = new Date(Date.now() - 24 * 60 * 60 * 1000);
    this.errorLog = this.errorLog.filter(error => error.timestamp >= oneDayAgo);
  }

  private classifyError(error: Error | string): ErrorClassification {
    if (isChainError(error)) {
      return CHAIN_ERROR_CLASSIFICATION[error.category];
    }

    if (error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')) {
      return { type: ErrorType.MINING_ERROR, severity: ErrorSeverity.LOW, recoverable: true };
    }

    const lowerMessage = (error instanceof Error ? error.message : error).toLowerCase();

    if (lowerMessage.includes('invalid') ||
      lowerMessage.includes('must be') ||
      lowerMessage.includes('required')) {
      return { type: ErrorType.VALIDATION_ERROR, severity: ErrorSeverity.MEDIUM, recoverable: true };
    }

    return { type: ErrorType.SYSTEM_ERROR, severity: ErrorSeverity.HIGH, recoverable: false };
  }

  private logError(error: StructuredError): void {
    this.errorLog.push(error);

    if (this.errorLog.length > this.maxLogSize) {
      this.errorLog = this.errorLog.slice(-this.maxLogSize);
    }

    const logData = {
      type: error.type,
      severity: error.severity,
      code: error.code,
      context: error.context,
      timestamp: error.timestamp.toISOString(),
      recoverable: error.recoverable
    };

    switch (error.severity) {
      case ErrorSeverity.CRITICAL:
      case ErrorSeverity.HIGH:
        this.logger.error(logData, error.message);
        break;
      case ErrorSeverity.MEDIUM:
        this.logger.warn(logData, error.message);
        break;
      case ErrorSeverity.LOW:
        this.logger.info(logData, error.message);
        break;
    }
  }
}

// Export singleton instance
export const errorHandler = ErrorHandler.getInstance();
