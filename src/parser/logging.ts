/**
 * livyscan — Logging reconfiguration detection.
 */

export interface LoggingMatch {
  configKeyHint: string;
  disablesLogging: boolean;
}

// Most specific first; the first hit names the change
const LOGGING_RULES: Array<[RegExp, string]> = [
  [/\blogging\.basicConfig\b/, 'logging.basicConfig'],
  [/\blogging\.disable\b/, 'logging.disable'],
  [/\bsetLogLevel\b/, 'setLogLevel'],
  [/\bsetLevel\b/, 'setLevel'],
  [/\baddHandler\b/, 'addHandler'],
  [/\bremoveHandler\b/, 'removeHandler'],
  [/\bspark\.log\.level\b/i, 'spark.log.level'],
  [/\brootLogger\b/i, 'rootLogger'],
  [/\blog4j2?\.(?:logger|appender|configuration(?:File)?)\b/i, 'log4j'],
];

const DISABLING = /disable|\b(?:off|false|none|fatal|critical)\b/i;

export function matchLoggingChange(line: string): LoggingMatch | null {
  for (const [pattern, hint] of LOGGING_RULES) {
    if (pattern.test(line)) {
      return { configKeyHint: hint, disablesLogging: DISABLING.test(line) };
    }
  }
  return null;
}
