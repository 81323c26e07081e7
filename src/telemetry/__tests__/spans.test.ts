/**
 * Tests for tool span helpers.
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { SpanKind, SpanStatusCode } from '@opentelemetry/api';

import {
  ATTR_ERROR_TYPE,
  ATTR_FS_WARDEN_TIER,
  ATTR_GEN_AI_OPERATION_NAME,
  ATTR_GEN_AI_TOOL_CALL_ID,
  ATTR_GEN_AI_TOOL_NAME,
  endToolSpan,
  startToolSpan,
} from '../index.js';
import { initializeTestTelemetry } from './test-helpers.js';
import type { SpanCapture } from './test-helpers.js';

describe('Tool span helpers', () => {
  let capture: SpanCapture;

  beforeEach(async () => {
    capture = await initializeTestTelemetry();
  });

  afterEach(async () => {
    await capture.shutdown();
  });

  describe('startToolSpan', () => {
    it('names the span after the tool', () => {
      endToolSpan(startToolSpan({ toolName: 'read_file' }), { success: true });

      const span = capture.getFirstSpan();
      expect(span.name).toBe('execute_tool read_file');
      expect(span.kind).toBe(SpanKind.INTERNAL);
      expect(capture.getAttribute(span, ATTR_GEN_AI_OPERATION_NAME)).toBe('execute_tool');
      expect(capture.getAttribute(span, ATTR_GEN_AI_TOOL_NAME)).toBe('read_file');
      expect(capture.getAttribute(span, ATTR_GEN_AI_TOOL_CALL_ID)).toBeUndefined();
    });

    it('records the call id and tier', () => {
      endToolSpan(startToolSpan({ toolName: 'write_file', toolCallId: '42', tier: 'write' }), {
        success: true,
      });

      const span = capture.getFirstSpan();
      expect(capture.getAttribute(span, ATTR_GEN_AI_TOOL_CALL_ID)).toBe('42');
      expect(capture.getAttribute(span, ATTR_FS_WARDEN_TIER)).toBe('write');
    });
  });

  describe('endToolSpan', () => {
    it('sets OK status on success', () => {
      endToolSpan(startToolSpan({ toolName: 'read_file' }), { success: true });

      expect(capture.getFirstSpan().status.code).toBe(SpanStatusCode.OK);
    });

    it('records the error code on failure', () => {
      endToolSpan(startToolSpan({ toolName: 'read_file' }), { success: false, errorType: 'NOT_FOUND' });

      const span = capture.getFirstSpan();
      expect(span.status).toEqual({ code: SpanStatusCode.ERROR, message: 'NOT_FOUND' });
      expect(capture.getAttribute(span, ATTR_ERROR_TYPE)).toBe('NOT_FOUND');
    });

    it('uses a generic message without an error code', () => {
      endToolSpan(startToolSpan({ toolName: 'read_file' }), { success: false });

      expect(capture.getFirstSpan().status.message).toBe('Tool execution failed');
    });
  });
});
