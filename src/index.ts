import { AccessEvent, Access, PackedData, ToggleCounter } from './access-event';
import ApiEndpoints from './api-endpoints';
import { logger as applicationLogger } from './application-logger';
import ToggleClient, { ToggleDetail } from './client/toggle-client';
import { ToggleClientConfig, ToggleClientOptions, buildClientConfig } from './config';
import ConfigurationRequestor from './configuration-requestor';
import { IToggleStore } from './configuration-store/configuration-store';
import { EMPTY_REPOSITORY, MemoryToggleStore } from './configuration-store/memory.store';
import * as constants from './constants';
import { EvaluationDetail, Evaluator } from './evaluator';
import EventRecorder, { RecorderState } from './event-recorder';
import FetchHttpClient, { HttpRequestError, IHttpClient } from './http-client';
import {
  Range,
  Repository,
  Rule,
  Segment,
  SegmentRule,
  Serve,
  Split,
  Toggle,
} from './interfaces';
import {
  Condition,
  ConditionType,
  DatetimePredicate,
  OrderingPredicate,
  SegmentPredicate,
  StringPredicate,
} from './rules';
import { DeterministicSharder, SHA1Sharder, Sharder } from './sharders';
import Synchronizer, { SynchronizerState } from './synchronizer';
import { ToggleValue, ToggleValueType } from './toggle-value';
import { Attributes, JsonValue } from './types';
import { ToggleUser } from './user';
import { ConfigurationError } from './validation';
import { LIB_VERSION } from './version';

export {
  applicationLogger,
  ToggleClient,
  ToggleDetail,
  ToggleUser,
  ToggleValue,
  ToggleValueType,
  constants,
  LIB_VERSION,

  // Configuration
  ToggleClientConfig,
  ToggleClientOptions,
  buildClientConfig,
  ConfigurationError,

  // Evaluation
  Evaluator,
  EvaluationDetail,
  Sharder,
  SHA1Sharder,
  DeterministicSharder,

  // Synchronization
  ApiEndpoints,
  ConfigurationRequestor,
  FetchHttpClient,
  HttpRequestError,
  IHttpClient,
  IToggleStore,
  MemoryToggleStore,
  EMPTY_REPOSITORY,
  Synchronizer,
  SynchronizerState,

  // Events
  EventRecorder,
  RecorderState,
  AccessEvent,
  Access,
  PackedData,
  ToggleCounter,

  // Interfaces
  Attributes,
  JsonValue,
  Repository,
  Toggle,
  Serve,
  Split,
  Range,
  Rule,
  Segment,
  SegmentRule,
  Condition,
  ConditionType,
  StringPredicate,
  SegmentPredicate,
  DatetimePredicate,
  OrderingPredicate,
};
