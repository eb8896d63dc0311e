export * from './errors';
export * from './logger';
export * from './config';

// Chain builder + executor
export * from './chain/step';
export * from './chain/execution';
export * from './chain/animate';

// Host collaborators (transactions, timers, frames, tweening)
export * from './anim/adapter';
export * from './anim/easing';
export * from './anim/timers';
export * from './anim/timedHost';
export * from './anim/transactionHost';
export * from './anim/layerAnimator';
export * from './anim/registryAdapter';

// View toolkit: leaf effects and single-step chain factories
export * from './view/types';
export * from './view/transform';
export * from './view/color';
export * from './view/viewRegistry';
export * from './view/effects';
export * from './view/animations';
