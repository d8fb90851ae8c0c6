import { execFile } from 'child_process';
import { promisify } from 'util';
import ffmpegInstaller from '@ffmpeg-installer/ffmpeg';
import ffprobeInstaller from '@ffprobe-installer/ffprobe';
import { logger } from './log.js';
//------------------------------------------------------------------------------//

const execFileAsync = promisify(execFile);

export type ToolName = 'ffmpeg' | 'ffprobe';

export interface ToolInfo {
  name: ToolName;
  path: string;
  version: string;
  source: 'system' | 'installer';
}

const installerPaths: Record<ToolName, string> = {
  ffmpeg: ffmpegInstaller.path,
  ffprobe: ffprobeInstaller.path,
};

const cache = new Map<ToolName, ToolInfo>();

/**
 * 도구 정보 캐시 무효화
 * 테스트용으로만 사용
 */
export function clearToolCache(): void {
  cache.clear();
}

/**
 * 최적의 실행 파일 경로 감지
 *
 * 우선순위:
 * 1. 시스템 PATH의 바이너리
 * 2. @ffmpeg-installer / @ffprobe-installer 번들 바이너리
 */
export async function detectTool(name: ToolName): Promise<ToolInfo> {
  const cached = cache.get(name);
  if (cached) {
    return cached;
  }

  const systemPath = await findOnPath(name);
  const systemVersion = systemPath ? await getVersion(name, systemPath) : null;

  let info: ToolInfo;
  if (systemPath && systemVersion) {
    info = { name, path: systemPath, version: systemVersion, source: 'system' };
    logger.debug('system', `Using system ${name}: ${systemPath} (${systemVersion})`);
  } else {
    const bundled = installerPaths[name];
    info = { name, path: bundled, version: (await getVersion(name, bundled)) ?? 'unknown', source: 'installer' };
    logger.debug('system', `Using bundled ${name}: ${bundled}`);
  }

  cache.set(name, info);
  return info;
}

export const detectFFmpeg = () => detectTool('ffmpeg');
export const detectFFprobe = () => detectTool('ffprobe');

/**
 * 동기 버전: 경로 가져오기
 *
 * 주의: detectTool()을 먼저 호출해야 시스템 바이너리가 선택됨
 */
export function getToolPath(name: ToolName): string {
  return cache.get(name)?.path ?? installerPaths[name];
}

export const getFFmpegPath = () => getToolPath('ffmpeg');
export const getFFprobePath = () => getToolPath('ffprobe');

// which/where 로 PATH 상의 첫 번째 경로 찾기
async function findOnPath(name: ToolName): Promise<string | null> {
  const finder = process.platform === 'win32' ? 'where' : 'which';
  try {
    const { stdout } = await execFileAsync(finder, [name]);
    const first = stdout.trim().split(/\r?\n/)[0];
    return first || null;
  } catch {
    // PATH에 없음
    return null;
  }
}

async function getVersion(name: ToolName, toolPath: string): Promise<string | null> {
  try {
    const { stdout, stderr } = await execFileAsync(toolPath, ['-version']);
    const match = (stdout || stderr).match(new RegExp(`${name} version ([^\\s]+)`, 'i'));
    return match ? match[1] : null;
  } catch (error) {
    logger.debug('system', `Failed to read ${name} version at ${toolPath}: ${error instanceof Error ? error.message : String(error)}`);
    return null;
  }
}
