export * from './logging';
export * from './errors';

export * from './config/languageProfile';
export * from './config/languageProfileLoader';
export * from './config/proxyConfig';

export * from './framing/wireFormat';
export * from './framing/backpressurePolicy';
export * from './framing/framedCodec';
export * from './framing/bareCodec';
export * from './framing/messageFramer';
export * from './framing/jsonSpans';

export * from './state/normalizeId';
export * from './state/correlationTable';
export * from './state/frameMap';
export * from './state/locationState';
export * from './state/sessionState';

export * from './classify/codeClassifier';

export * from './protocol/envelopes';
export * from './protocol/dialect';
export * from './protocol/delveTypes';
export * from './protocol/jsonRpcDialect';
export * from './protocol/dapDialect';

export * from './interceptors/requestInterceptor';
export * from './interceptors/responseInterceptor';

export * from './autostep/autoStepController';
export * from './autostep/backendChannel';
export * from './autostep/jsonRpcAutoStepController';
export * from './autostep/dapAutoStepController';

export * from './session/backendDialer';
export * from './session/proxySession';
export * from './session/sessionManager';

export * from './backend/backendLauncher';
