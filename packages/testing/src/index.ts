export { record, type ChangeRecording } from './change-recorder.js';
