// src/stateMachine/definedStates.ts

export enum PageStates {
    PENDING = 'PENDING',
    SKIPPED = 'SKIPPED',
    FETCHING = 'FETCHING',
    COMPOSING = 'COMPOSING',
    SAVED = 'SAVED',
    FAILED = 'FAILED',
}

export enum ManuscriptStates {
    INIT = 'INIT',
    RESOLVE_PAGES = 'RESOLVE_PAGES',
    PREPARE_OUTPUT = 'PREPARE_OUTPUT',
    DOWNLOAD_PAGES = 'DOWNLOAD_PAGES',
    COMPLETED = 'COMPLETED',
    ERROR = 'ERROR',
}
