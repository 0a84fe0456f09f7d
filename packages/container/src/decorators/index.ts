export { Constructs } from './constructs.js';
export { Inject } from './inject.js';
export { Injectable } from './injectable.js';
