import type { FastifyInstance, FastifyReply } from 'fastify';
import { DIRECTIONS, type Direction } from '../../types/index.js';
import type { FilterBandEntry, FilterBandModel } from '../../services/filterbands/filter-band-model.js';
import type { FrequencyRange } from '../../services/filterbands/frequency-range.js';
import { describeSelection, selectFilter, selectFilterForBand } from '../../services/filterbands/band-selector.js';

interface FilterRouteDeps {
  /** Current model; null until the first successful compile */
  getModel: () => FilterBandModel | null;
}

interface SelectQuery {
  freqKhz?: string;
  bandwidthKhz?: string;
  direction?: string;
  ids?: string;
  band?: string;
}

function serializeRange(range: FrequencyRange) {
  return {
    lowDmhz: range.lowDmhz,
    highDmhz: range.highDmhz,
    lowMhz: range.lowMhz,
    highMhz: range.highMhz,
  };
}

export function serializeEntry(entry: FilterBandEntry) {
  return {
    hardwareId: entry.hardwareId,
    uplink: serializeRange(entry.uplink),
    downlink: serializeRange(entry.downlink),
    directionMask: entry.directionMask,
    legacyFilterId: entry.legacyFilterId,
    band: entry.band,
    protocolBandNumber: entry.protocolBandNumber,
    filterSlot: entry.filterSlot,
    filtersInGroup: entry.filtersInGroup,
    extraFlags: entry.extraFlags,
    calibrationGroup: entry.calibrationGroup,
  };
}

function parseNonNegativeInt(value: string | undefined): number | null {
  if (value === undefined || !/^\d+$/.test(value)) return null;
  return parseInt(value, 10);
}

function parseIdList(value: string): number[] | null {
  const parts = value.split(',').map((p) => p.trim()).filter((p) => p.length > 0);
  if (parts.some((p) => !/^-?\d+$/.test(p))) return null;
  return parts.map((p) => parseInt(p, 10));
}

function isDirection(value: string): value is Direction {
  return DIRECTIONS.some((direction) => direction === value);
}

export function filterRoutes(deps: FilterRouteDeps) {
  return async function (app: FastifyInstance) {
    const { getModel } = deps;

    function requireModel(reply: FastifyReply): FilterBandModel | null {
      const model = getModel();
      if (!model) {
        reply.code(503).send({ error: 'Filter table has not been compiled' });
      }
      return model;
    }

    app.get('/api/health', async (_request, reply) => {
      const model = requireModel(reply);
      if (!model) return reply;
      return { status: 'ok', entries: model.size, widebandId: model.widebandId };
    });

    // Full table in hardware id order
    app.get('/api/filters', async (_request, reply) => {
      const model = requireModel(reply);
      if (!model) return reply;
      return { count: model.size, filters: model.entries.map(serializeEntry) };
    });

    app.get<{ Params: { id: string } }>('/api/filters/:id', async (request, reply) => {
      const model = requireModel(reply);
      if (!model) return reply;

      const id = parseNonNegativeInt(request.params.id);
      if (id === null) {
        return reply.code(400).send({ error: 'Invalid hardware ID' });
      }

      const entry = model.get(id);
      if (!entry) {
        return reply.code(404).send({ error: 'Filter not found' });
      }
      return serializeEntry(entry);
    });

    app.get('/api/bands', async (_request, reply) => {
      const model = requireModel(reply);
      if (!model) return reply;

      const bands = Array.from(model.byBand.entries()).map(([band, filters]) => ({
        band,
        count: filters.length,
      }));
      return { bands };
    });

    app.get<{ Params: { band: string } }>('/api/bands/:band/filters', async (request, reply) => {
      const model = requireModel(reply);
      if (!model) return reply;

      const { band } = request.params;
      if (!model.bandFilterEnum.has(band)) {
        return reply.code(404).send({ error: `Unknown band filter ${band}` });
      }
      return { band, filters: model.filtersForBand(band).map(serializeEntry) };
    });

    app.get<{ Querystring: SelectQuery }>('/api/select', async (request, reply) => {
      const model = requireModel(reply);
      if (!model) return reply;

      const freqKhz = parseNonNegativeInt(request.query.freqKhz);
      if (freqKhz === null) {
        return reply.code(400).send({ error: 'freqKhz must be a non-negative integer' });
      }

      const bandwidthKhz = parseNonNegativeInt(request.query.bandwidthKhz ?? '0');
      if (bandwidthKhz === null) {
        return reply.code(400).send({ error: 'bandwidthKhz must be a non-negative integer' });
      }

      const direction = request.query.direction ?? 'both';
      if (!isDirection(direction)) {
        return reply.code(400).send({ error: `direction must be one of ${DIRECTIONS.join(', ')}` });
      }

      let candidateIds: number[] | undefined;
      if (request.query.ids !== undefined) {
        const ids = parseIdList(request.query.ids);
        if (ids === null) {
          return reply.code(400).send({ error: 'ids must be a comma-separated list of integers' });
        }
        candidateIds = ids;
      }

      const { band } = request.query;
      if (band !== undefined && !model.bandFilterEnum.has(band)) {
        return reply.code(400).send({ error: `Unknown band filter ${band}` });
      }

      const hardwareId = band
        ? selectFilterForBand(model, freqKhz, bandwidthKhz, band, direction, candidateIds)
        : selectFilter(model, freqKhz, bandwidthKhz, direction, candidateIds);

      if (hardwareId === null) {
        return { found: false, hardwareId: null, selection: null, filter: null };
      }

      const entry = model.get(hardwareId);
      return {
        found: true,
        hardwareId,
        selection: describeSelection(model, hardwareId, direction),
        filter: entry ? serializeEntry(entry) : null,
      };
    });
  };
}
