export * as HM from './hm.js';
