/**
 * Core models - the environmental state of one pile
 *
 * - moisture: Rain, evaporation and manual wetting/drying
 * - aeration: Compaction and turning
 * - temperature: Microbial heat balance against ambient
 * - material-ratio: Carbon:nitrogen scoring
 */

export * from './moisture';
export * from './aeration';
export * from './temperature';
export * from './material-ratio';
