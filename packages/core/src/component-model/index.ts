export { ObservableObject, type SetPropertyOptions } from './observable-object.js';
export { ObservableBox, createBox, createAlwaysBox, type BoxOptions } from './observable-box.js';
