export { saveSlots } from './save-slots.js';
