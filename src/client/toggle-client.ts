import { AccessEvent } from '../access-event';
import { logger, loggerPrefix } from '../application-logger';
import { ToggleClientConfig, ToggleClientOptions, buildClientConfig } from '../config';
import ConfigurationRequestor from '../configuration-requestor';
import { IToggleStore } from '../configuration-store/configuration-store';
import { MemoryToggleStore } from '../configuration-store/memory.store';
import { NOT_EXIST_REASON, TYPE_MISMATCH_REASON } from '../constants';
import { EvaluationDetail, Evaluator, noneResult } from '../evaluator';
import EventRecorder from '../event-recorder';
import FetchHttpClient from '../http-client';
import { Repository, Toggle } from '../interfaces';
import Synchronizer from '../synchronizer';
import { ToggleValue } from '../toggle-value';
import { JsonValue } from '../types';
import { ToggleUser } from '../user';
import { errorMessage } from '../util';

export interface ToggleDetail<T extends JsonValue> {
  value: T;
  /** Position of the matching rule, `null` when the disabled or default serve was used. */
  ruleIndex: number | null;
  version: number | null;
  reason: string;
}

export default class ToggleClient {
  private readonly evaluator = new Evaluator();

  constructor(
    private readonly toggleStore: IToggleStore,
    private readonly eventRecorder?: EventRecorder,
    private readonly synchronizer?: Synchronizer,
    public readonly config?: ToggleClientConfig,
  ) {}

  /**
   * Builds a client that keeps its toggles in sync with `remoteUrl` and reports access events
   * there.
   *
   * When `waitFirstResponse` is set (the default) the returned promise resolves after the first
   * snapshot fetch has landed or failed, bounded by `refreshIntervalMs`.
   *
   * @throws ConfigurationError when the URL, SDK key or refresh interval is malformed
   */
  static async init(
    remoteUrl: string,
    serverSdkKey: string,
    options: ToggleClientOptions = {},
  ): Promise<ToggleClient> {
    const config = buildClientConfig(remoteUrl, serverSdkKey, options);
    const httpClient = new FetchHttpClient(
      config.apiEndpoints,
      config.serverSdkKey,
      config.refreshIntervalMs,
    );
    const toggleStore = new MemoryToggleStore();
    const eventRecorder = new EventRecorder(httpClient, config.refreshIntervalMs);
    const synchronizer = new Synchronizer(
      new ConfigurationRequestor(httpClient, toggleStore),
      toggleStore,
      config.refreshIntervalMs,
    );

    const client = new ToggleClient(toggleStore, eventRecorder, synchronizer, config);
    eventRecorder.start();
    await synchronizer.start(config.waitFirstResponse);
    return client;
  }

  /**
   * Builds an offline client whose toggles each serve the given value to every user. Meant for
   * unit testing code that depends on toggles; it never touches the network or records events.
   */
  static forTest(values: Record<string, JsonValue>): ToggleClient {
    const toggles: Record<string, Toggle> = {};
    Object.entries(values).forEach(([key, value]) => {
      toggles[key] = {
        key,
        enabled: true,
        version: 0,
        forClient: false,
        disabledServe: { select: 0 },
        defaultServe: { select: 0 },
        rules: [],
        variations: [value],
      };
    });
    return new ToggleClient(new MemoryToggleStore({ toggles, segments: {} }));
  }

  public boolValue(toggleKey: string, user: ToggleUser, defaultValue: boolean): boolean {
    return this.boolDetail(toggleKey, user, defaultValue).value;
  }

  public boolDetail(
    toggleKey: string,
    user: ToggleUser,
    defaultValue: boolean,
  ): ToggleDetail<boolean> {
    return this.genericDetail(toggleKey, user, defaultValue, (value) => value.asBool());
  }

  public stringValue(toggleKey: string, user: ToggleUser, defaultValue: string): string {
    return this.stringDetail(toggleKey, user, defaultValue).value;
  }

  public stringDetail(
    toggleKey: string,
    user: ToggleUser,
    defaultValue: string,
  ): ToggleDetail<string> {
    return this.genericDetail(toggleKey, user, defaultValue, (value) => value.asString());
  }

  public numberValue(toggleKey: string, user: ToggleUser, defaultValue: number): number {
    return this.numberDetail(toggleKey, user, defaultValue).value;
  }

  public numberDetail(
    toggleKey: string,
    user: ToggleUser,
    defaultValue: number,
  ): ToggleDetail<number> {
    return this.genericDetail(toggleKey, user, defaultValue, (value) => value.asNumber());
  }

  public jsonValue(toggleKey: string, user: ToggleUser, defaultValue: JsonValue): JsonValue {
    return this.jsonDetail(toggleKey, user, defaultValue).value;
  }

  public jsonDetail(
    toggleKey: string,
    user: ToggleUser,
    defaultValue: JsonValue,
  ): ToggleDetail<JsonValue> {
    return this.genericDetail(toggleKey, user, defaultValue, (value) => value.asJSON());
  }

  public isInitialized(): boolean {
    return this.toggleStore.isInitialized();
  }

  public getToggleKeys(): string[] {
    return this.toggleStore.getKeys();
  }

  /**
   * Stops synchronization, clears the toggles and stops the event recorder. The returned promise
   * resolves once the recorder's final flush attempt is over.
   */
  public async close(): Promise<void> {
    if (this.synchronizer) {
      this.synchronizer.stop();
      this.synchronizer.clear();
    } else {
      this.toggleStore.clear();
    }
    await this.eventRecorder?.stop();
  }

  private genericDetail<T extends JsonValue>(
    toggleKey: string,
    user: ToggleUser,
    defaultValue: T,
    convert: (value: ToggleValue) => T | undefined,
  ): ToggleDetail<T> {
    const evaluation = this.evaluate(toggleKey, user);
    const detail: ToggleDetail<T> = {
      value: defaultValue,
      ruleIndex: evaluation.ruleIndex,
      version: evaluation.version,
      reason: evaluation.reason,
    };

    if (evaluation.value) {
      const converted = convert(evaluation.value);
      if (converted === undefined) {
        logger.warn(
          `${loggerPrefix} ${TYPE_MISMATCH_REASON} for toggle ${toggleKey}: ${evaluation.value.valueType}`,
        );
        detail.reason = TYPE_MISMATCH_REASON;
      } else {
        detail.value = converted;
      }
    }

    this.recordAccess(toggleKey, evaluation, defaultValue);
    return detail;
  }

  private evaluate(toggleKey: string, user: ToggleUser): EvaluationDetail {
    // one snapshot per call: the toggle and the segments it references always come from the same
    // published repository
    const repository = this.toggleStore.getRepository();
    const toggle = repository ? findToggle(repository, toggleKey) : null;
    if (!repository || !toggle) {
      logger.warn(`${loggerPrefix} No toggle found for key: ${toggleKey}`);
      return noneResult(null, null, `Toggle:[${toggleKey}] ${NOT_EXIST_REASON}`);
    }

    try {
      return this.evaluator.evaluateToggle(toggle, user, repository.segments);
    } catch (error) {
      logger.error(`${loggerPrefix} Error evaluating toggle ${toggleKey}: ${errorMessage(error)}`);
      const version = typeof toggle.version === 'number' ? toggle.version : null;
      return noneResult(null, version, `Evaluation error: ${errorMessage(error)}`);
    }
  }

  private recordAccess(toggleKey: string, evaluation: EvaluationDetail, defaultValue: JsonValue) {
    if (!this.eventRecorder) {
      return;
    }
    const event: AccessEvent = {
      time: Date.now(),
      key: toggleKey,
      value: evaluation.value ? evaluation.value.toJSON() : defaultValue,
      index: evaluation.variationIndex,
      version: evaluation.version,
      reason: evaluation.reason,
    };
    this.eventRecorder.record(event);
  }
}

function findToggle(repository: Repository, toggleKey: string): Toggle | null {
  return Object.prototype.hasOwnProperty.call(repository.toggles, toggleKey)
    ? repository.toggles[toggleKey]
    : null;
}
