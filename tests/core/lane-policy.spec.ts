import { describe, expect, it } from 'vitest';
import { LanePolicy } from '../../src/core/lane-policy.js';
import { ConfidencePolicy } from '../../src/core/confidence.js';

const options = { onDeviceProvider: 'ollama_local', cloudProvider: 'cloud_openai' };

describe('LanePolicy', () => {
  it('defaults to the grounded on-device lane', () => {
    const policy = new LanePolicy({ ...options, enableCloudLane: true });
    expect(policy.decide('disk full?')).toEqual({
      lane: 'on_device_rag',
      provider: 'ollama_local',
      reason: 'default lane',
    });
  });

  it('honours a cloud hint, case-insensitively, while the cloud lane is enabled', () => {
    const policy = new LanePolicy({ ...options, enableCloudLane: true });
    expect(policy.decide('q', 'CLOUD').lane).toBe('cloud_direct');
    expect(policy.decide('q', 'cloud_direct').provider).toBe('cloud_openai');
  });

  it('stays on-device when the cloud lane is disabled', () => {
    const policy = new LanePolicy({ ...options, enableCloudLane: false });
    expect(policy.decide('q', 'cloud')).toEqual({
      lane: 'on_device_rag',
      provider: 'ollama_local',
      reason: 'cloud hint ignored: cloud lane disabled',
    });
  });

  it('ignores unrelated hints', () => {
    const policy = new LanePolicy({ ...options, enableCloudLane: true });
    expect(policy.decide('q', 'slack').lane).toBe('on_device_rag');
  });
});

describe('ConfidencePolicy', () => {
  const policy = new ConfidencePolicy();
  const cited = [{ chunkId: 1, source: 'a.md', preview: 'p' }];
  const long = 'Restart the ingest worker, then verify the queue depth drops below the alert line.';

  it('accepts a long cited answer', () => {
    expect(policy.evaluate({ answer: long, citations: cited }, 'on_device_rag')).toEqual({
      lowConfidence: false,
      reason: null,
    });
  });

  it('flags empty and short answers', () => {
    expect(policy.evaluate({ answer: '   ', citations: cited }, 'on_device_rag').reason).toBe('empty');
    expect(policy.evaluate({ answer: 'Restart it.', citations: cited }, 'cloud_direct').reason).toBe('too_short');
  });

  it('flags uncertainty markers in several languages', () => {
    const padding = ' The runbooks describe the ingest worker and the queue alert thresholds.';
    for (const phrase of ['I am NOT SURE about this.', '원인을 모르겠습니다.', '原因不知道。', 'The cause is Unknown.']) {
      expect(policy.evaluate({ answer: phrase + padding, citations: cited }, 'cloud_direct').reason)
        .toBe('uncertainty_marker');
    }
  });

  it('requires citations only on the grounded lane', () => {
    expect(policy.evaluate({ answer: long, citations: [] }, 'on_device_rag').reason).toBe('no_citations');
    expect(policy.evaluate({ answer: long, citations: [] }, 'cloud_direct').lowConfidence).toBe(false);
  });
});
