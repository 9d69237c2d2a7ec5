/**
 * PlacementExportService - File-level TVM802 export operations
 *
 * Wraps the pure readers and writers with file IO, logging and the
 * BOM-required policy. Every operation reads its inputs completely, then
 * writes its single output file; nothing runs concurrently.
 *
 * Operations:
 * - detectFileSchema / listFiducials: inspect a placement file
 * - readBomIndex / readFeederCatalog: load lookup tables
 * - listComponentKeys / generateFeederTemplate: feeders template
 * - generateMachineData: TVM802 placement file
 */

import { config } from '../../config.js';
import { log, type Logger } from '../../utils/logger.js';
import { BomRequiredError } from '../../utils/errors.js';
import { readTextFile, writeTextFile } from '../../utils/files.js';
import {
  collectFiducialRefs,
  parsePlacementTable,
  readPlacementRecords,
  readPlacementRefs,
} from '../placement/index.js';
import { buildBomIndex } from '../bom/index.js';
import { buildFeederCatalog } from '../feeders/index.js';
import { collectComponentKeys, renderFeederTemplate, renderMachineData } from '../output/index.js';
import type {
  BomIndex,
  FeederCatalog,
  MachineDataResult,
  MachineRowDefaults,
  PlacementTable,
  PositionSchema,
  ReaderOptions,
  TemplateRowDefaults,
} from '../../types/index.js';

// ============================================================================
// Types
// ============================================================================

export interface PlacementExportConfig {
  /** Refuse positions.csv input that comes without a BOM */
  requireBomForPositions: boolean;
  machineDefaults: MachineRowDefaults;
  templateDefaults: TemplateRowDefaults;
}

export interface FeederTemplateRequest {
  placementPath: string;
  outputPath: string;
  bomIndex?: BomIndex;
  requireBomForPositions?: boolean;
}

export interface FeederTemplateResult {
  outputPath: string;
  schema: PositionSchema;
  componentKeys: string[];
}

export interface MachineDataRequest {
  placementPath: string;
  outputPath: string;
  /** Path of the feeders CSV, or an already loaded catalog */
  feeders: string | FeederCatalog;
  markRef1?: string | null;
  markRef2?: string | null;
  bomIndex?: BomIndex;
  skipUnassigned?: boolean;
  requireBomForPositions?: boolean;
}

export interface MachineDataRunResult extends MachineDataResult {
  outputPath: string;
  schema: PositionSchema;
}

// ============================================================================
// PlacementExportService
// ============================================================================

export class PlacementExportService {
  private config: PlacementExportConfig;
  private logger: Logger;

  constructor(configOverrides: Partial<PlacementExportConfig> = {}) {
    this.config = {
      requireBomForPositions: config.requireBomForPositions,
      machineDefaults: config.machine,
      templateDefaults: config.template,
      ...configOverrides,
    };

    this.logger = log.child({ service: 'PlacementExportService' });
  }

  async detectFileSchema(placementPath: string): Promise<PositionSchema> {
    const table = await this.loadPlacement(placementPath, 'detectFileSchema');
    return table.schema;
  }

  async listFiducials(placementPath: string): Promise<string[]> {
    const table = await this.loadPlacement(placementPath, 'listFiducials');
    const refs = collectFiducialRefs(readPlacementRefs(table));
    this.logger.debug('Collected fiducials', { filePath: placementPath, count: refs.length });
    return refs;
  }

  async readBomIndex(bomPath: string, options?: ReaderOptions): Promise<BomIndex> {
    const text = await readTextFile(bomPath, 'readBomIndex');
    const index = buildBomIndex(text, { ...options, source: bomPath });
    this.logger.info('Loaded BOM', { filePath: bomPath, designators: index.size });
    return index;
  }

  async readFeederCatalog(feedersPath: string, options?: ReaderOptions): Promise<FeederCatalog> {
    const text = await readTextFile(feedersPath, 'readFeederCatalog');
    const catalog = buildFeederCatalog(text, { ...options, source: feedersPath });
    this.logger.info('Loaded feeders', { filePath: feedersPath, keys: catalog.size });
    return catalog;
  }

  async listComponentKeys(placementPath: string, bomIndex?: BomIndex): Promise<string[]> {
    const table = await this.loadPlacement(placementPath, 'listComponentKeys');
    return collectComponentKeys(readPlacementRecords(table, 'keys'), bomIndex);
  }

  /**
   * Write a feeders CSV with one blank assignment per component key.
   */
  async generateFeederTemplate(request: FeederTemplateRequest): Promise<FeederTemplateResult> {
    const startTime = Date.now();
    const table = await this.loadPlacement(request.placementPath, 'generateFeederTemplate');
    this.enforceBomPolicy(table, request, 'generateFeederTemplate');

    const componentKeys = collectComponentKeys(
      readPlacementRecords(table, 'keys'),
      request.bomIndex
    );
    await writeTextFile(
      request.outputPath,
      renderFeederTemplate(componentKeys, this.config.templateDefaults),
      'generateFeederTemplate'
    );

    this.logger.info('Feeders template written', {
      operation: 'generateFeederTemplate',
      filePath: request.outputPath,
      schema: table.schema,
      components: componentKeys.length,
      duration: Date.now() - startTime,
    });

    return { outputPath: request.outputPath, schema: table.schema, componentKeys };
  }

  /**
   * Write the TVM802 machine file for a placement file.
   */
  async generateMachineData(request: MachineDataRequest): Promise<MachineDataRunResult> {
    const startTime = Date.now();
    const table = await this.loadPlacement(request.placementPath, 'generateMachineData');
    this.enforceBomPolicy(table, request, 'generateMachineData');

    const catalog = typeof request.feeders === 'string'
      ? await this.readFeederCatalog(request.feeders)
      : request.feeders;

    const document = renderMachineData(readPlacementRecords(table, 'placement'), catalog, {
      markRef1: request.markRef1,
      markRef2: request.markRef2,
      bomIndex: request.bomIndex,
      skipUnassigned: request.skipUnassigned,
      defaults: this.config.machineDefaults,
    });
    await writeTextFile(request.outputPath, document.content, 'generateMachineData');

    if (document.rowsTotal > 0 && document.rowsWithFeeder === 0) {
      this.logger.warn('No feeders matched any placement', {
        operation: 'generateMachineData',
        lookedUpKeys: document.lookedUpKeys.length,
        catalogKeys: catalog.size,
      });
    }

    this.logger.info('Machine data written', {
      operation: 'generateMachineData',
      filePath: request.outputPath,
      schema: table.schema,
      rowsTotal: document.rowsTotal,
      rowsWithFeeder: document.rowsWithFeeder,
      mark1: document.mark1.ref,
      mark2: document.mark2.ref,
      duration: Date.now() - startTime,
    });

    return {
      outputPath: request.outputPath,
      schema: table.schema,
      rowsTotal: document.rowsTotal,
      rowsWithFeeder: document.rowsWithFeeder,
      mark1: document.mark1,
      mark2: document.mark2,
    };
  }

  private async loadPlacement(placementPath: string, operation: string): Promise<PlacementTable> {
    const text = await readTextFile(placementPath, operation);
    const table = parsePlacementTable(text, placementPath);
    this.logger.debug('Parsed placement file', {
      operation,
      filePath: placementPath,
      schema: table.schema,
      rows: table.rows.length,
    });
    return table;
  }

  private enforceBomPolicy(
    table: PlacementTable,
    request: { placementPath: string; bomIndex?: BomIndex; requireBomForPositions?: boolean },
    operation: string
  ): void {
    if (table.schema !== 'positions' || request.bomIndex) {
      return;
    }
    if (request.requireBomForPositions ?? this.config.requireBomForPositions) {
      throw new BomRequiredError(request.placementPath, { operation });
    }
    this.logger.warn('positions.csv input without a BOM; every part gets its own key', {
      operation,
      filePath: request.placementPath,
    });
  }
}

// ============================================================================
// Singleton Instance
// ============================================================================

let exportServiceInstance: PlacementExportService | null = null;

/**
 * Get or create the PlacementExportService singleton
 */
export function getPlacementExportService(
  configOverrides?: Partial<PlacementExportConfig>
): PlacementExportService {
  if (!exportServiceInstance) {
    exportServiceInstance = new PlacementExportService(configOverrides);
  }
  return exportServiceInstance;
}

/**
 * Clear the singleton instance (for testing)
 */
export function clearPlacementExportService(): void {
  exportServiceInstance = null;
}

export default PlacementExportService;
