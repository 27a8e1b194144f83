export { millReadings, type MillReadingRow, type NewMillReadingRow } from './readings'
