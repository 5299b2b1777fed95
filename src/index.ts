// Core
export { QemuCommandBuilder, DriveOptions } from './core/QemuCommandBuilder'
export { QemuDriver, QemuDriverOptions, createDriver, DEFAULT_STOP_TIMEOUT_MS, DEFAULT_STARTUP_GRACE_MS } from './core/QemuDriver'
export { buildDefaultArgs, HEADLESS_WARNING, NO_ACCELERATION_WARNING } from './core/DefaultArgumentBuilder'
export { buildTemplateContext, expandOverrideArgs } from './core/ArgumentExpander'
export {
  collectOverrides,
  backfillDefaults,
  flattenArgs,
  mergeArgs,
  groupTokens
} from './core/ArgumentMerger'
export { synthesizeArgs, SynthesisInput } from './core/synthesizeArgs'

// Steps
export { StepRun, StepRunOptions, createRunStep } from './steps/StepRun'

// Display
export { VncConfig } from './display/VncConfig'

// Template
export { HandlebarsRenderer } from './template/HandlebarsRenderer'

// UI
export { DebugUi } from './ui/DebugUi'

// Config
export {
  prepareConfig,
  ACCELERATORS,
  DISK_INTERFACES,
  DISK_CACHES,
  DISK_DISCARDS,
  DISK_FORMATS,
  NET_DEVICES,
  DEFAULT_BUILD_NAME
} from './config/BuilderConfig'

// Types - Arguments
export {
  FlagKey,
  FlagRow,
  OverrideSpec,
  DefaultSpec,
  MultiValueMap,
  TokenSequence,
  Accelerator,
  DiskInterface,
  DiskCache,
  DiskDiscard,
  DiskFormat,
  BootDrive,
  DEFAULT_MEMORY,
  DEFAULT_DISPLAY,
  USER_NET_HOST_IP,
  USER_NETDEV_ID,
  GUEST_SSH_PORT,
  DEFAULT_QEMU_BINARY
} from './types/qemu.types'

// Types - Step
export {
  Ui,
  ProcessSupervisor,
  QemuArgsTemplateData,
  TemplateContext,
  TemplateRenderer,
  DiscoveredFacts,
  RunState,
  StepAction,
  Step,
  RunPhase
} from './types/step.types'

// Types - Config
export {
  QemuBuilderConfig,
  RawBuilderConfig,
  ConfigError,
  ConfigErrorCode
} from './types/config.types'

// Types - Display
export { VncConfigOptions, VNC_BASE_PORT, MAX_VNC_PORT, DEFAULT_VNC_ADDR } from './types/display.types'

// Types - Errors
export {
  StepErrorCode,
  StepError,
  RenderError,
  ArgumentSynthesisError,
  LaunchError,
  StopError,
  isStepError,
  toError
} from './types/errors.types'
