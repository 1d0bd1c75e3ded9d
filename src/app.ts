import express, { type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import rateLimit from 'express-rate-limit';
import config from './config/index.js';
import { componentLogger } from './utils/logger.js';
import { httpStatusFor, isErrorPayload, type ErrorPayload } from './utils/errors.js';
import { isRecord } from './utils/validation.js';
import type { CareerAdvisor, Outcome } from './services/career-advisor.js';

/** The part of an express response the outcome writer needs. */
export interface JsonResponder {
  status(code: number): JsonResponder;
  json(body: unknown): unknown;
}

/** Error payloads get the status their code maps to; results go out as 200. */
export function sendOutcome<T>(res: JsonResponder, outcome: Outcome<T>): void {
  if (isErrorPayload(outcome)) {
    res.status(httpStatusFor(outcome)).json(outcome);
    return;
  }
  res.json(outcome);
}

function field(body: unknown, key: string): unknown {
  return isRecord(body) ? body[key] : undefined;
}

const httpLog = componentLogger('http');

/** The parts of an express request the access log reads. */
export interface LoggedRequest {
  ip?: string | undefined;
  query: Record<string, unknown>;
  get(name: string): string | undefined;
}

export interface RequestLogFields {
  status: number;
  durationMs: number;
  ip?: string;
  userAgent?: string;
  region?: string;
  mode?: string;
}

export function requestLogFields(req: LoggedRequest, status: number, startedAt: number, now = Date.now()): RequestLogFields {
  const fields: RequestLogFields = { status, durationMs: now - startedAt };
  const userAgent = req.get('user-agent');
  const { region, mode } = req.query;
  if (req.ip) fields.ip = req.ip;
  if (userAgent) fields.userAgent = userAgent;
  if (typeof region === 'string' && region !== '') fields.region = region;
  if (typeof mode === 'string' && mode !== '') fields.mode = mode;
  return fields;
}

export function createApp(advisor: CareerAdvisor): express.Express {
  const app = express();

  // Security middleware
  app.use(helmet());
  app.use(
    cors({
      origin: config.http.corsOrigin,
      credentials: true,
    })
  );

  app.use(
    '/api/',
    rateLimit({
      windowMs: config.http.rateLimitWindowMs,
      limit: config.http.rateLimitMax,
      standardHeaders: true,
      legacyHeaders: false,
      message: { error: 'Too many requests from this IP, please try again later.' },
    })
  );

  app.use(express.json({ limit: config.http.bodyLimit }));
  app.use(compression());

  // Request logging, written once the response is sent
  app.use((req, res, next) => {
    const started = Date.now();
    res.on('finish', () => {
      httpLog.info(`${req.method} ${req.path} ${res.statusCode}`, requestLogFields(req, res.statusCode, started));
    });
    next();
  });

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      environment: config.app.env,
      version: config.app.version,
    });
  });

  // Recommendations
  app.post('/api/recommend', (req, res) => sendOutcome(res, advisor.recommend(req.body)));
  app.get('/api/careers-by-region', (req, res) => sendOutcome(res, advisor.careersByRegion(req.query.region)));
  app.get('/api/trending-careers', (req, res) => sendOutcome(res, advisor.trendingCareers(req.query)));

  // Personality
  app.get('/api/personality/questions', (_req, res) => sendOutcome(res, advisor.personalityQuestions()));
  app.post('/api/personality-result', (req, res) =>
    sendOutcome(res, advisor.personalityResult(field(req.body, 'answers')))
  );

  // Role models and tips
  app.get('/api/daily-tip', (req, res) => sendOutcome(res, advisor.dailyTip(req.query)));
  app.get('/api/weekly-tips', (req, res) => sendOutcome(res, advisor.weeklyTips(req.query)));
  app.get('/api/role-models', (req, res) => sendOutcome(res, advisor.roleModelsFor(req.query)));

  // Skills gap and reality check
  app.post('/api/skills-gap', (req, res) => sendOutcome(res, advisor.skillsGapAnalysis(req.body)));
  app.get('/api/reality-check/:career', (req, res) => sendOutcome(res, advisor.realityCheck(req.params.career)));

  // Comparison
  app.get('/api/comparison/careers', (req, res) => sendOutcome(res, advisor.comparableCareers(req.query.region)));
  app.post('/api/compare', (req, res) =>
    sendOutcome(res, advisor.compare(field(req.body, 'careers'), field(req.body, 'region')))
  );
  app.post('/api/compare/detailed', (req, res) =>
    sendOutcome(
      res,
      advisor.detailedComparison(field(req.body, 'career1'), field(req.body, 'career2'), field(req.body, 'region'))
    )
  );

  // Simulation
  app.get('/api/simulation/careers', (_req, res) => sendOutcome(res, advisor.simulationCareers()));
  app.post('/api/simulation/compare', (req, res) =>
    sendOutcome(res, advisor.compareSimulations(field(req.body, 'careers'), field(req.body, 'region')))
  );
  app.get('/api/simulation/:career', (req, res) =>
    sendOutcome(res, advisor.careerSimulation(req.params.career, req.query.region))
  );
  app.get('/api/simulation/:career/summary', (req, res) =>
    sendOutcome(res, advisor.simulationSummary(req.params.career, req.query.region))
  );
  app.get('/api/simulation/:career/insights', (req, res) =>
    sendOutcome(res, advisor.simulationInsights(req.params.career, req.query.region))
  );
  app.get('/api/simulation/:career/timeline', (req, res) =>
    sendOutcome(res, advisor.stressTimeline(req.params.career, req.query.region))
  );

  // Risk
  app.post('/api/risk-assessment', (req, res) => sendOutcome(res, advisor.riskAssessment(req.body)));
  app.post('/api/risk-assessment/quick', (req, res) => sendOutcome(res, advisor.quickRiskAssessment(req.body)));

  // 404 handler
  app.use((req, res) => {
    const payload: ErrorPayload = { error: `No route for ${req.method} ${req.path}`, code: 'NOT_FOUND' };
    res.status(404).json(payload);
  });

  // Error handler
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (isRecord(err) && err.type === 'entity.parse.failed') {
      const payload: ErrorPayload = { error: 'Request body is not valid JSON', code: 'VALIDATION_ERROR' };
      res.status(400).json(payload);
      return;
    }
    httpLog.error('Unhandled error:', err);
    const payload: ErrorPayload = { error: 'Internal error', code: 'UNEXPECTED_ERROR' };
    res.status(500).json(payload);
  });

  return app;
}
