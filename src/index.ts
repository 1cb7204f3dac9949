// Builder
export { TemplateBuilder, TemplateBuilderOptions } from './builder/TemplateBuilder'
export { TemplateArtifact } from './builder/TemplateArtifact'

// Steps and runner
export { StepCreateTemplate, CreateTemplateConfig, CLONE_TITLE_PREFIX } from './steps/StepCreateTemplate'
export { StepRunner } from './pipeline/StepRunner'

// Driver
export { UpCloudDriver, UpCloudDriverOptions, STORAGE_STATE_ONLINE } from './driver/UpCloudDriver'

// Configuration
export { prepareConfig, loadConfig, rawBuilderConfigSchema, RawBuilderConfig } from './config/BuilderConfig'
export { prepareCommunicator, RawCommunicatorConfig } from './communicator/CommunicatorConfig'
export { convertNetworkInterfaces, validateNetworkInterfaces, RawNetworkInterface } from './network/NetworkInterfaces'

// Ui
export { ConsoleUi, OutputStream } from './ui/ConsoleUi'

// Utilities
export { TimestampSource, formatTimestamp } from './utils/timestamp'
export { parseDuration, formatDuration } from './utils/duration'

// Types - Driver
export {
  Driver,
  StorageVolume,
  Template,
  DriverError,
  DriverErrorCode,
  DEFAULT_API_BASE_URL,
  DEFAULT_POLL_INTERVAL_MS
} from './types/driver.types'

// Types - Pipeline
export {
  BuildState,
  Ui,
  Step,
  StepAction,
  RunResult,
  StepError,
  StepErrorCode,
  BuildError,
  haltWithError
} from './types/pipeline.types'

// Types - Config
export {
  BuilderConfig,
  CommunicatorConfig,
  CommunicatorType,
  ConfigError,
  EnvLookup,
  PrepareOptions,
  PrepareResult,
  DEFAULT_TEMPLATE_PREFIX,
  DEFAULT_SSH_USERNAME,
  DEFAULT_STORAGE_SIZE,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_SSH_PORT,
  DEFAULT_SSH_TIMEOUT,
  MAX_TEMPLATE_TITLE_LENGTH,
  ENV_API_USER,
  ENV_API_PASSWORD
} from './types/config.types'

// Types - Network
export {
  CreateServerInterface,
  CreateServerIPAddress,
  InterfaceType,
  IPAddressFamily,
  DEFAULT_NETWORKING,
  INTERFACE_TYPES,
  IP_ADDRESS_FAMILIES
} from './types/network.types'
