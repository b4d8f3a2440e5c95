import { Injectable } from '@nestjs/common';

import { mapAppConfig } from './app-config.mapper';
import { envSchema, type ParsedEnv } from './app-config.schema';
import type { AppConfig, TelegramAckStrategy } from './app-config.types';
import { assertTelegramConfig } from './app-config.validators';

@Injectable()
export class AppConfigService {
  private readonly config: AppConfig;

  public constructor() {
    const parsedEnv: ParsedEnv = envSchema.parse(process.env);
    assertTelegramConfig(parsedEnv);

    this.config = mapAppConfig(parsedEnv);
  }

  public get appVersion(): string {
    return this.config.appVersion;
  }

  public get nodeEnv(): AppConfig['nodeEnv'] {
    return this.config.nodeEnv;
  }

  public get port(): number {
    return this.config.port;
  }

  public get logLevel(): AppConfig['logLevel'] {
    return this.config.logLevel;
  }

  public get metricsEnabled(): boolean {
    return this.config.metricsEnabled;
  }

  public get telegramEnabled(): boolean {
    return this.config.telegramEnabled;
  }

  public get botToken(): string | null {
    return this.config.botToken;
  }

  public get telegramApiBaseUrl(): string {
    return this.config.telegramApiBaseUrl;
  }

  public get telegramAdminIds(): readonly number[] {
    return this.config.telegramAdminIds;
  }

  public get pollTimeoutSec(): number {
    return this.config.pollTimeoutSec;
  }

  public get pollLimit(): number {
    return this.config.pollLimit;
  }

  public get pollRequestMarginMs(): number {
    return this.config.pollRequestMarginMs;
  }

  public get sendTimeoutMs(): number {
    return this.config.sendTimeoutMs;
  }

  public get loopIdleMs(): number {
    return this.config.loopIdleMs;
  }

  public get pollConflictBackoffMs(): number {
    return this.config.pollConflictBackoffMs;
  }

  public get pollRateLimitBackoffMs(): number {
    return this.config.pollRateLimitBackoffMs;
  }

  public get sendRateLimitBackoffMs(): number {
    return this.config.sendRateLimitBackoffMs;
  }

  public get ackStrategy(): TelegramAckStrategy {
    return this.config.ackStrategy;
  }

  public get seenUpdatesCapacity(): number {
    return this.config.seenUpdatesCapacity;
  }

  public get seenCallbacksCapacity(): number {
    return this.config.seenCallbacksCapacity;
  }

  public get messageHashesCapacity(): number {
    return this.config.messageHashesCapacity;
  }

  public get rapidRepeatWindowSec(): number {
    return this.config.rapidRepeatWindowSec;
  }

  public get messageCooldownMs(): number {
    return this.config.messageCooldownMs;
  }

  public get callbackCooldownMs(): number {
    return this.config.callbackCooldownMs;
  }

  public get rateLedgerTtlSec(): number {
    return this.config.rateLedgerTtlSec;
  }

  public get listenerTtlSec(): number {
    return this.config.listenerTtlSec;
  }

  public get outboundMinTimeMs(): number {
    return this.config.outboundMinTimeMs;
  }

  public get outboundMaxConcurrent(): number {
    return this.config.outboundMaxConcurrent;
  }

  public get sendRetryAttempts(): number {
    return this.config.sendRetryAttempts;
  }

  public isAdmin(telegramId: number): boolean {
    return this.config.telegramAdminIds.includes(telegramId);
  }
}
