export * from './core/types';
export * from './core/constants';
export * from './core/disassembler';
export * from './core/ipu';
export * from './core/sequence/timing';
export * from './core/sequence/variables';
export * from './core/sequence/jumps';
export * from './core/sequence/channels';
export * from './core/sequence/hardware';
export * from './core/sequence/control-register';
export * from './core/sequence/sequence';
export * from './core/sequence/reachability';
export * from './core/sequence/verify';
export * from './core/compiler/instructions';
export * from './core/compiler/ledger';
export * from './core/compiler/conditions';
export * from './core/compiler/placement';
export * from './core/compiler/report';
export * from './core/compiler/compiler';
