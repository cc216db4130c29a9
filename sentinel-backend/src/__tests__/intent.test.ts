/**
 * Unit tests for the chat keyword intent parser.
 */

import { describe, it, expect } from 'vitest';
import { extractServiceId, HELP_MESSAGE, parseIntent } from '../ai/intent.js';

const SERVICE_IDS = ['svc_web', 'svc_web_alt', 'svc_api', 'svc_db'];

describe('parseIntent', () => {
  it('maps keywords to a tool', () => {
    expect(parseIntent('Show idle instances', SERVICE_IDS)).toEqual({
      tool: 'list_idle_instances',
      args: {},
      clarification: null,
    });
  });

  it('picks the tool with the most matching keywords', () => {
    expect(parseIntent("what's the hygiene score and status?", SERVICE_IDS).tool).toBe('get_hygiene_score');
  });

  it('breaks ties in favour of the earlier tool', () => {
    expect(parseIntent('show the idle cost', SERVICE_IDS).tool).toBe('list_idle_instances');
  });

  it('extracts the service for a restart', () => {
    expect(parseIntent('Restart svc_api please', SERVICE_IDS)).toEqual({
      tool: 'restart_service',
      args: { service_id: 'svc_api' },
      clarification: null,
    });
  });

  it('asks which service to restart when none is named', () => {
    expect(parseIntent('restart something', SERVICE_IDS)).toEqual({
      tool: null,
      args: {},
      clarification: 'Which service would you like to restart? Available: svc_web, svc_web_alt, svc_api, svc_db',
    });
  });

  it('falls back to the first service for metrics and anomalies', () => {
    expect(parseIntent('check for anomalies', SERVICE_IDS).args).toEqual({ service_id: 'svc_web' });
  });

  it('picks up a forecast month', () => {
    expect(parseIntent('cost forecast for 2026-04', SERVICE_IDS)).toEqual({
      tool: 'get_billing_forecast',
      args: { month: '2026-04' },
      clarification: null,
    });
  });

  it('routes remediation questions to the event list', () => {
    expect(parseIntent('show remediation incidents', SERVICE_IDS).tool).toBe('list_remediation_events');
  });

  it('returns the help message when nothing matches', () => {
    expect(parseIntent('hello there', SERVICE_IDS)).toEqual({ tool: null, args: {}, clarification: HELP_MESSAGE });
  });
});

describe('extractServiceId', () => {
  it('prefers the longest exact id', () => {
    expect(extractServiceId('metrics for svc_web_alt', SERVICE_IDS)).toBe('svc_web_alt');
    expect(extractServiceId('metrics for svc_web', SERVICE_IDS)).toBe('svc_web');
  });

  it('resolves short names to known services', () => {
    expect(extractServiceId('ram usage on the database', SERVICE_IDS)).toBe('svc_db');
    expect(extractServiceId('restart the web tier', SERVICE_IDS)).toBe('svc_web');
  });

  it('ignores short names for services that do not exist', () => {
    expect(extractServiceId('restart the cache', SERVICE_IDS)).toBeNull();
  });
});
