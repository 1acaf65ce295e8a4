import 'reflect-metadata';

process.env.LOG_SILENT = 'true';
