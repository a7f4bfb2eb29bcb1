/**
 * Control API Router
 * Device management, on-demand reads/writes, BBMD registration and
 * topic mappings
 */

import express from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { BridgeControl } from '../bridge';
import { MqttMappingSchema } from '../models/mqtt-mapping.model';
import { PRESENT_VALUE_PROPERTY } from '../bacnet/constants';
import { describeError } from '../errors';
import { LogComponents } from '../logging/components';
import type { Logger } from '../logging/types';
import { BadRequestError } from './middleware';

const DiscoverBodySchema = z.object({
	low_limit: z.number().int().min(0).max(4194303).optional(),
	high_limit: z.number().int().min(0).max(4194303).optional(),
	timeout: z.number().min(1).max(120).optional()
});

const ReadBodySchema = z.object({
	device_id: z.number().int().min(0),
	object_type: z.string().min(1),
	object_instance: z.number().int().min(0),
	property_id: z.string().min(1).default(PRESENT_VALUE_PROPERTY),
	array_index: z.number().int().min(1).optional()
});

const WriteBodySchema = ReadBodySchema.extend({
	value: z.union([z.string(), z.number(), z.boolean(), z.null()]),
	priority: z.number().int().min(1).max(16).optional()
});

function parseInteger(value: string, name: string): number {
	if (!/^\d+$/.test(value)) {
		throw new BadRequestError(`Invalid ${name}: ${value}`);
	}
	return Number(value);
}

export function createRouter(bridge: BridgeControl, logger: Logger): express.Router {
	const router = express.Router();

	/**
	 * GET /health
	 */
	router.get('/health', (_req: Request, res: Response) => {
		res.status(200).json({ status: 'ok' });
	});

	/**
	 * GET /status
	 * Bridge runtime state
	 */
	router.get('/status', (_req: Request, res: Response) => {
		res.status(200).json(bridge.status());
	});

	/**
	 * GET /devices
	 */
	router.get('/devices', (_req: Request, res: Response) => {
		res.status(200).json(bridge.listDevices().map(device => device.toRecord()));
	});

	/**
	 * POST /devices/discover
	 * Broadcast Who-Is and wait for answers
	 */
	router.post('/devices/discover', async (req: Request, res: Response, next: NextFunction) => {
		try {
			const body = DiscoverBodySchema.parse(req.body ?? {});
			const devices = await bridge.discover(body.low_limit, body.high_limit, body.timeout);
			res.status(200).json({
				count: devices.length,
				devices: devices.map(device => device.toRecord())
			});
		} catch (error) {
			next(error);
		}
	});

	/**
	 * GET /devices/:id
	 */
	router.get('/devices/:id', (req: Request, res: Response, next: NextFunction) => {
		try {
			const device = bridge.getDevice(parseInteger(req.params.id, 'device id'));
			res.status(200).json(device.toRecord());
		} catch (error) {
			next(error);
		}
	});

	/**
	 * POST /devices/:id/discover-objects
	 * Enumerate objects in the background
	 */
	router.post('/devices/:id/discover-objects', (req: Request, res: Response, next: NextFunction) => {
		try {
			const deviceId = parseInteger(req.params.id, 'device id');
			bridge.getDevice(deviceId);

			bridge.discoverObjects(deviceId).catch((error: unknown) => {
				logger.error('Object discovery failed', {
					component: LogComponents.API,
					deviceId,
					error: describeError(error)
				});
			});

			res.status(202).json({ status: 'started', device_id: deviceId });
		} catch (error) {
			next(error);
		}
	});

	/**
	 * PUT /devices/:id/enable
	 */
	router.put('/devices/:id/enable', async (req: Request, res: Response, next: NextFunction) => {
		try {
			const device = await bridge.enable(parseInteger(req.params.id, 'device id'));
			res.status(200).json(device.toRecord());
		} catch (error) {
			next(error);
		}
	});

	/**
	 * PUT /devices/:id/disable
	 */
	router.put('/devices/:id/disable', async (req: Request, res: Response, next: NextFunction) => {
		try {
			const device = await bridge.disable(parseInteger(req.params.id, 'device id'));
			res.status(200).json(device.toRecord());
		} catch (error) {
			next(error);
		}
	});

	/**
	 * DELETE /devices/:id
	 */
	router.delete('/devices/:id', async (req: Request, res: Response, next: NextFunction) => {
		try {
			const deviceId = parseInteger(req.params.id, 'device id');
			const removed = await bridge.remove(deviceId);
			if (!removed) {
				return res.status(404).json({ error: 'Not found', message: `Device ${deviceId} not found` });
			}
			return res.status(200).json({ removed: true, device_id: deviceId });
		} catch (error) {
			next(error);
		}
	});

	/**
	 * GET /devices/:id/objects
	 */
	router.get('/devices/:id/objects', (req: Request, res: Response, next: NextFunction) => {
		try {
			const device = bridge.getDevice(parseInteger(req.params.id, 'device id'));
			res.status(200).json(Array.from(device.objects.values()).map(obj => obj.toRecord()));
		} catch (error) {
			next(error);
		}
	});

	/**
	 * GET /devices/:id/objects/:type/:instance
	 */
	router.get('/devices/:id/objects/:type/:instance', (req: Request, res: Response, next: NextFunction) => {
		try {
			const obj = bridge.getObject(
				parseInteger(req.params.id, 'device id'),
				req.params.type,
				parseInteger(req.params.instance, 'object instance')
			);
			res.status(200).json(obj.toRecord());
		} catch (error) {
			next(error);
		}
	});

	/**
	 * POST /read
	 * Read one property now
	 */
	router.post('/read', async (req: Request, res: Response, next: NextFunction) => {
		try {
			const body = ReadBodySchema.parse(req.body);
			const value = await bridge.read({
				deviceId: body.device_id,
				objectType: body.object_type,
				objectInstance: body.object_instance,
				propertyId: body.property_id,
				arrayIndex: body.array_index
			});
			res.status(200).json({ ...body, value });
		} catch (error) {
			next(error);
		}
	});

	/**
	 * POST /write
	 */
	router.post('/write', async (req: Request, res: Response, next: NextFunction) => {
		try {
			const body = WriteBodySchema.parse(req.body);
			await bridge.write({
				deviceId: body.device_id,
				objectType: body.object_type,
				objectInstance: body.object_instance,
				propertyId: body.property_id,
				arrayIndex: body.array_index,
				value: body.value,
				priority: body.priority
			});
			res.status(200).json({ success: true });
		} catch (error) {
			next(error);
		}
	});

	/**
	 * POST /bbmd/register
	 * Register with the BBMD immediately
	 */
	router.post('/bbmd/register', async (_req: Request, res: Response, next: NextFunction) => {
		try {
			res.status(200).json(await bridge.triggerRegistration());
		} catch (error) {
			next(error);
		}
	});

	/**
	 * GET /mqtt/mappings
	 */
	router.get('/mqtt/mappings', (_req: Request, res: Response) => {
		res.status(200).json(bridge.listMappings());
	});

	/**
	 * GET /mqtt/mapping/:id/:type/:instance
	 */
	router.get('/mqtt/mapping/:id/:type/:instance', (req: Request, res: Response, next: NextFunction) => {
		try {
			const mapping = bridge.getMapping(
				parseInteger(req.params.id, 'device id'),
				req.params.type,
				parseInteger(req.params.instance, 'object instance')
			);
			if (!mapping) {
				return res.status(404).json({ error: 'Not found', message: 'Mapping not found' });
			}
			return res.status(200).json(mapping);
		} catch (error) {
			next(error);
		}
	});

	/**
	 * POST /mqtt/mapping
	 * Create or replace a mapping
	 */
	router.post('/mqtt/mapping', async (req: Request, res: Response, next: NextFunction) => {
		try {
			const mapping = await bridge.upsertMapping(MqttMappingSchema.parse(req.body));
			res.status(200).json(mapping);
		} catch (error) {
			next(error);
		}
	});

	/**
	 * DELETE /mqtt/mapping/:id/:type/:instance
	 */
	router.delete('/mqtt/mapping/:id/:type/:instance', async (req: Request, res: Response, next: NextFunction) => {
		try {
			const removed = await bridge.removeMapping(
				parseInteger(req.params.id, 'device id'),
				req.params.type,
				parseInteger(req.params.instance, 'object instance')
			);
			if (!removed) {
				return res.status(404).json({ error: 'Not found', message: 'Mapping not found' });
			}
			return res.status(200).json({ removed: true });
		} catch (error) {
			next(error);
		}
	});

	return router;
}
