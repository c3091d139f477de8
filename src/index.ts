export {TableGrid, AUTO_ACTIVATION_INTERVAL_MS} from './tableGrid.js';
export type {TableGridOptions} from './tableGrid.js';

export {PatternMatcher, globToRegExp, validatePattern} from './patternMatcher.js';
export {WindowDetector, sameWindow, SYSTEM_OWNER_PREFIXES} from './windowDetector.js';
export {
    GRID_POSITION_TOLERANCE,
    captureCurrentLayout,
    createRegularGridSlots,
    inferGridSlots,
    optimizeCapturedLayout,
} from './gridInference.js';
export type {GridInferenceOptions} from './gridInference.js';
export {assignWindowsToSlots, assignmentsByWindow, sortSlotsByPriority, unplacedWindows} from './layoutAssignment.js';
export {
    ASPECT_RATIO_TOLERANCE,
    DEFAULT_TABLE_ASPECT_RATIO,
    MAX_OVERLAP,
    calculateOptimalGrid,
    createGridLayout,
    createOverlappingGridLayout,
    createPokerLayout,
} from './layoutGenerators.js';
export type {GridDimensions} from './layoutGenerators.js';

export {WindowManager} from './windowManager.js';
export type {ApplyLayoutResult, MoveFailure} from './windowManager.js';
export {DetectionService, DetectionStatus} from './detectionService.js';
export type {DetectionStatusType} from './detectionService.js';
export {HoverActivator, HoverActivationService, ACTIVATION_COOLDOWN_MS, HOVER_POLL_INTERVAL_MS} from './hoverActivator.js';
export type {ActivationRequest, WindowPicker} from './hoverActivator.js';
export {ConfigurationManager, conditionHolds} from './configurationManager.js';
export {Settings, SettingsSchema} from './settings.js';
export type {SettingsKey, SettingsValues} from './settings.js';
export {
    KNOWN_CLIENT_PREFIXES,
    copyWindowType,
    createClassPattern,
    createTitlePattern,
    findCommonTitlePattern,
    generateWindowTypeName,
    loadDefaultWindowTypes,
    refineWindowType,
    windowTypeFromWindow,
} from './windowTypes.js';

export {JsonFileStore, decodeConfigurations, encodeConfiguration} from './utils/configStore.js';
export {createLogger, consoleSink, Logger, LogLevel} from './utils/debug.js';
export type {LogSink} from './utils/debug.js';
export {LayoutError, LayoutErrorCode, PlatformError, PlatformErrorCode, isPlatformError} from './utils/errors.js';
export {NotificationService, NotifyCategory} from './utils/notificationService.js';
export {SignalTracker} from './utils/signalTracker.js';

export type {DisplayId, Point, Rect} from './types/geometry.js';
export type {AutoActivationCondition, Configuration, Layout, MatchingStrategy, Slot, SlotAssignment} from './types/layout.js';
export type {
    ConfigStore,
    CursorProvider,
    DisplayProvider,
    NotificationKind,
    Notifier,
    OwnerIdentity,
    RawWindowRecord,
    WindowController,
    WindowEnvironment,
} from './types/platform.js';
export type {ManagedWindow, WindowInfo, WindowType} from './types/window.js';
