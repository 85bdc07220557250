/**
 * Configuration error classifier for netgauge.
 *
 * Categorizes configuration loading errors and provides helpful user-facing
 * messages with actionable suggestions.
 */

/**
 * Error category for configuration loading failures.
 */
export type ConfigErrorType = 'syntax' | 'read' | 'unknown';

/**
 * Categorized error details for configuration loading failures.
 */
export interface ConfigErrorDetails {
  /** Error category: syntax, read, or unknown */
  type: ConfigErrorType;
  /** User-friendly error message */
  userMessage: string;
  /** Technical error details from the underlying error */
  technicalDetails: string;
  /** Actionable suggestions to help resolve the error */
  suggestions: string[];
}

const READ_ERROR_CODES = new Set(['ENOENT', 'EACCES', 'EISDIR', 'EPERM']);

/**
 * Error classifier for configuration loading failures.
 *
 * Separates malformed JSON (syntax) from files that could not be read at
 * all (read), and lumps everything else under unknown.
 */
export class ConfigErrorClassifier {
  /**
   * Classify and format a configuration loading error.
   *
   * @param error - The error thrown while reading or parsing the file
   * @param configPath - Path of the configuration file
   * @returns Formatted error details with categorization and suggestions
   */
  static classify(error: unknown, configPath: string): ConfigErrorDetails {
    const errorMessage =
      error instanceof Error ? error.message : String(error);
    const errorType = this.detectErrorType(error);

    return {
      type: errorType,
      userMessage: this.createUserMessage(errorType),
      technicalDetails: errorMessage,
      suggestions: this.createSuggestions(errorType, errorMessage, configPath),
    };
  }

  /**
   * Format classified details as one multi-line message.
   */
  static format(details: ConfigErrorDetails, configPath: string): string {
    const lines = [
      details.userMessage,
      '',
      `Config file: ${configPath}`,
      '',
      'Technical details:',
      details.technicalDetails,
    ];

    if (details.suggestions.length > 0) {
      lines.push('', 'Suggestions:');
      for (const suggestion of details.suggestions) {
        lines.push(`  - ${suggestion}`);
      }
    }

    return lines.join('\n');
  }

  private static detectErrorType(error: unknown): ConfigErrorType {
    if (error instanceof SyntaxError) {
      return 'syntax';
    }

    if (
      error instanceof Error &&
      'code' in error &&
      typeof error.code === 'string' &&
      READ_ERROR_CODES.has(error.code)
    ) {
      return 'read';
    }

    return 'unknown';
  }

  private static createUserMessage(type: ConfigErrorType): string {
    switch (type) {
      case 'syntax': {
        return 'Configuration file is not valid JSON';
      }
      case 'read': {
        return 'Configuration file could not be read';
      }
      case 'unknown': {
        return 'Failed to load configuration file';
      }
    }
  }

  private static createSuggestions(
    type: ConfigErrorType,
    errorMessage: string,
    configPath: string
  ): string[] {
    switch (type) {
      case 'syntax': {
        const suggestions: string[] = [];
        if (errorMessage.includes('Unexpected end of JSON input')) {
          suggestions.push('Check for unclosed braces or brackets');
        } else {
          suggestions.push(
            'Check for trailing commas and unquoted keys',
            'Comments are not allowed in JSON'
          );
        }
        suggestions.push(`Validate the file with: jq . ${configPath}`);
        return suggestions;
      }
      case 'read': {
        return [
          'Verify the path is correct and points to a file',
          'Check file permissions allow reading',
        ];
      }
      case 'unknown': {
        return ['Check the error message above for more details'];
      }
    }
  }
}
