/**
 * Robots System
 * Main export file for robots.txt handling
 */

export * from './robots.types';
export * from './robots.policy';
export * from './robots.registry';
