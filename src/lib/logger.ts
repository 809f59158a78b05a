// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Replacement for Effect's default logger: a padded, optionally colored
 * level label with a `[component]` prefix in pretty mode, one JSON object per
 * line in json mode. ERROR and above go to stderr, everything else to stdout.
 */

import {
  Array as Arr,
  Cause,
  type ConfigError,
  Effect,
  HashMap,
  Inspectable,
  Layer,
  LogLevel,
  Logger,
  Match,
  Option,
  pipe,
} from "effect";
import {
  type LogLevel as AppLogLevel,
  type LogFormat,
  LoggingConfigSpec,
} from "../config/env";

export type LogStream = "stdout" | "stderr";

/** Where formatted lines end up. Defaults to the process streams. */
export type LogSink = (line: string, stream: LogStream) => void;

type ColorName = "red" | "yellow" | "blue" | "cyan" | "gray" | "white";

/** Formatting-only annotations, rendered explicitly rather than as extra JSON fields. */
const INTERNAL_KEYS: ReadonlySet<string> = new Set(["component"]);

const ANSI: Readonly<Record<ColorName, string>> = {
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  cyan: "\x1b[36m",
  gray: "\x1b[90m",
  white: "\x1b[37m",
};

const LEVEL_COLORS: Readonly<Record<string, ColorName>> = {
  DEBUG: "gray",
  INFO: "blue",
  WARN: "yellow",
  ERROR: "red",
};

const processSink: LogSink = (line, stream) => {
  const target = stream === "stderr" ? process.stderr : process.stdout;
  target.write(`${line}\n`);
};

/** NO_COLOR wins over FORCE_COLOR; otherwise color only on a TTY. */
const detectColor = (): boolean =>
  process.env["NO_COLOR"] === undefined &&
  (process.env["FORCE_COLOR"] !== undefined || process.stdout.isTTY === true);

const toEffectLogLevel = (level: AppLogLevel): LogLevel.LogLevel =>
  pipe(
    Match.value(level),
    Match.when("debug", () => LogLevel.Debug),
    Match.when("info", () => LogLevel.Info),
    Match.when("warn", () => LogLevel.Warning),
    Match.when("error", () => LogLevel.Error),
    Match.exhaustive
  );

const colorize = (color: ColorName, text: string, useColor: boolean): string =>
  useColor ? `${ANSI[color]}${text}\x1b[0m` : text;

const getStringAnnotation = (
  annotations: HashMap.HashMap<string, unknown>,
  key: string
): Option.Option<string> =>
  pipe(
    HashMap.get(annotations, key),
    Option.filter((v): v is string => typeof v === "string")
  );

/** `Effect.log("a", "b")` hands the logger an array; a single message may arrive bare. */
const renderMessage = (message: unknown): string =>
  Arr.ensure(message)
    .map((m) => (typeof m === "string" ? m : Inspectable.toStringUnknown(m)))
    .join(" ");

const formatCause = (cause: Cause.Cause<unknown>): string =>
  Cause.isEmpty(cause) ? "" : `\n${Cause.pretty(cause)}`;

const formatPretty = (
  logLevel: LogLevel.LogLevel,
  message: string,
  annotations: HashMap.HashMap<string, unknown>,
  cause: Cause.Cause<unknown>,
  useColor: boolean
): string => {
  const levelColor = pipe(
    Option.fromNullable(LEVEL_COLORS[logLevel.label]),
    Option.getOrElse((): ColorName => "white")
  );
  const levelStr = colorize(levelColor, logLevel.label.padEnd(5), useColor);
  const componentStr = pipe(
    getStringAnnotation(annotations, "component"),
    Option.match({
      onNone: (): string => "",
      onSome: (c): string => `${colorize("cyan", `[${c}]`, useColor)} `,
    })
  );
  return `${levelStr} ${componentStr}${message}${formatCause(cause)}`;
};

const collectExternalAnnotations = (
  annotations: HashMap.HashMap<string, unknown>
): Record<string, unknown> =>
  Object.fromEntries(
    Array.from(HashMap.toEntries(annotations)).filter(([k]) => !INTERNAL_KEYS.has(k))
  );

const formatJson = (
  logLevel: LogLevel.LogLevel,
  message: string,
  annotations: HashMap.HashMap<string, unknown>,
  date: Date
): string =>
  JSON.stringify({
    timestamp: date.toISOString(),
    level: logLevel.label.toLowerCase(),
    ...pipe(
      getStringAnnotation(annotations, "component"),
      Option.match({
        onNone: (): Record<string, never> => ({}),
        onSome: (c): { readonly component: string } => ({ component: c }),
      })
    ),
    message,
    ...collectExternalAnnotations(annotations),
  });

const AppLogger = (
  format: LogFormat,
  useColor: boolean,
  sink: LogSink
): Logger.Logger<unknown, void> =>
  Logger.make(({ logLevel, message, cause, annotations, date }) => {
    const msg = renderMessage(message);
    const output = pipe(
      Match.value(format),
      Match.when("json", () => formatJson(logLevel, msg, annotations, date)),
      Match.when("pretty", () => formatPretty(logLevel, msg, annotations, cause, useColor)),
      Match.exhaustive
    );
    sink(output, LogLevel.greaterThanEqual(logLevel, LogLevel.Error) ? "stderr" : "stdout");
  });

export interface AppLoggerOptions {
  readonly level: AppLogLevel;
  readonly format: LogFormat;
  readonly color?: boolean;
  readonly sink?: LogSink;
}

export const AppLoggerLive = (options: AppLoggerOptions): Layer.Layer<never> =>
  Layer.merge(
    Logger.replace(
      Logger.defaultLogger,
      AppLogger(options.format, options.color ?? detectColor(), options.sink ?? processSink)
    ),
    Logger.minimumLogLevel(toEffectLogLevel(options.level))
  );

/** Logger layer configured from APP_VERSION_LOG_LEVEL / APP_VERSION_LOG_FORMAT. */
export const AppLoggerFromEnv: Layer.Layer<never, ConfigError.ConfigError> = Layer.unwrapEffect(
  Effect.gen(function* () {
    const logging = yield* LoggingConfigSpec;
    return AppLoggerLive(logging);
  })
);
