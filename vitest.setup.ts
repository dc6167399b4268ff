// Nest decorators read and write reflection metadata at import time
import 'reflect-metadata';
