// src/monitor/parser/index.ts
export * from './grammar';
export * from './nextflow';
export * from './slurm';
export * from './snakemake';
export * from './types';
export * from './wdl';
