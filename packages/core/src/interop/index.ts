export { toAsyncIterable } from './async-iterable.js';
export { toObservable, type ToObservableOptions } from './observable.js';
