/**
 * Parser Types
 */

export type TokenType =
    | 'IRI'         // <http://example.org/x>
    | 'NAME'        // ex:hasAuthor, hasAuthor, SELECT, a, http://example.org/x
    | 'VARIABLE'    // ?x, $x
    | 'LITERAL'     // "text", 'text'@en, "3"^^xsd:integer
    | 'NUMBER'      // 42, 3.5
    | 'LBRACE'      // {
    | 'RBRACE'      // }
    | 'DOT'         // .
    | 'SEMICOLON'   // ;
    | 'COMMA'       // ,
    | 'STAR'        // *
    | 'ARROW'       // =>
    | 'EOF';

export interface Token {
    type: TokenType;
    /** Raw text for IRI/NAME/NUMBER, the name for VARIABLE, the unescaped lexical form for LITERAL */
    value: string;
    position: number;
    /** LITERAL only */
    language?: string;
    /** LITERAL only: raw datatype token (`<iri>` or a prefixed name) */
    datatype?: string;
}
