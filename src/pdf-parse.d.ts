// The package types only its entry point; the lib file exports the same function.
declare module 'pdf-parse/lib/pdf-parse.js' {
    import pdf from 'pdf-parse';
    export default pdf;
}
