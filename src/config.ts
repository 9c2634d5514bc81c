import { Config as EffectConfig, LogLevel } from "effect";


export const AppConfig = {
  logLevel: EffectConfig.logLevel("LOG_LEVEL").pipe(
    EffectConfig.withDefault(LogLevel.Warning)
  ),
};
