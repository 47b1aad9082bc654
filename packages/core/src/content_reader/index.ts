export { decodeUtf8, readText, readFileToString } from './content_reader';
