import { fileURLToPath } from 'url';
import path from 'path';
//------------------------------------------------------------------------------//
const __filename: string = fileURLToPath(import.meta.url);
export const __dirname: string = path.dirname(__filename);

// tsx 실행 시: backend/src/utils → ../../ = backend/
// tsc 빌드 시: dist/backend/src/utils → ../../ = dist/backend/ → 프로젝트 루트는 두 단계 위
const isInDist = __dirname.split(path.sep).includes('dist');
export const backendRoot: string = path.join(__dirname, '../../');
export const projectRoot: string = isInDist ? path.join(backendRoot, '../../') : path.join(backendRoot, '../');
