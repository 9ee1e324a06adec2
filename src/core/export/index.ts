/**
 * Export Module - Barrel Export
 */

export { formatTutorResponse, formatSortedJson, ENCODE_FAILURE_PAYLOAD } from './tutor-response';
